import Ajv from 'ajv';
import fs from 'fs';
import { RoomSpec } from '../domain/entities/Room';
import { ConfigError, errorMessage } from '../domain/errors/PipelineErrors';

interface RoomInput {
    type: string;
    features: string[];
}

/**
 * Rooms used when no rooms file is given.
 */
export const DEFAULT_ROOMS: readonly RoomSpec[] = [
    { type: 'living room', features: ['spacious', 'modern', 'bright'] },
    { type: 'garden', features: ['private', 'landscaped', 'peaceful'] },
];

const ROOMS_SCHEMA = {
    type: 'array',
    minItems: 1,
    items: {
        type: 'object',
        properties: {
            type: { type: 'string', minLength: 1, pattern: '\\S' },
            features: { type: 'array', items: { type: 'string', minLength: 1 } },
        },
        required: ['type', 'features'],
        additionalProperties: false,
    },
};

const ajv = new Ajv({ allErrors: true });
const validateRooms = ajv.compile<RoomInput[]>(ROOMS_SCHEMA);

/**
 * Validates an already-parsed rooms list.
 * @throws ConfigError listing every schema violation
 */
export function parseRooms(value: unknown): RoomSpec[] {
    if (!validateRooms(value)) {
        const problems = (validateRooms.errors ?? [])
            .map(error => `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`)
            .join('; ');
        throw new ConfigError(`Invalid rooms list: ${problems}`);
    }
    return value.map(room => ({ type: room.type.trim(), features: room.features.map(feature => feature.trim()) }));
}

/**
 * Reads a JSON array of `{ type, features }` rooms.
 */
export function loadRooms(filePath: string): RoomSpec[] {
    let raw: string;
    try {
        raw = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
        throw new ConfigError(`Cannot read rooms file ${filePath}: ${errorMessage(error)}`);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        throw new ConfigError(`Rooms file ${filePath} is not valid JSON: ${errorMessage(error)}`);
    }

    return parseRooms(parsed);
}
