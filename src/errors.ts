/**
 * Raised at construction time when the tokenizer or scorer cannot be set up
 * (missing data files, invalid options, unknown sentence split mode).
 */
export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigurationError";
    }
}

/**
 * Raised when a declared but unimplemented feature is selected
 */
export class NotImplementedFeatureError extends Error {
    readonly feature: string;

    constructor(feature: string) {
        super(`${feature} is not implemented`);
        this.name = "NotImplementedFeatureError";
        this.feature = feature;
    }
}
