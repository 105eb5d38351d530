import { Description, RoomSpec } from '../entities/Room';

/**
 * IDescriptionGenerator - Port for producing a room's marketing copy.
 */
export interface IDescriptionGenerator {
    /**
     * @throws GenerationError when the model fails or the cleaned text is empty
     */
    generate(room: RoomSpec): Promise<Description>;
}
