/**
 * Raised when a scene or render setting can't produce a well-defined image.
 * `field` names the offending setting, e.g. "camera.fov" or "maxDepth".
 */
export class SceneValidationError extends Error {
    readonly field: string;

    constructor(field: string, message: string) {
        super(`${field}: ${message}`);
        this.name = 'SceneValidationError';
        this.field = field;
    }
}
