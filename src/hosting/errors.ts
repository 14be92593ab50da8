export type ConfigurationErrorCode =
    | "InvalidSkuForTier"
    | "MissingRequiredReference"
    | "IncompatibleFieldForTier"
    | "InvalidParameter";

export class ConfigurationError extends Error {
    readonly code: ConfigurationErrorCode;

    constructor(code: ConfigurationErrorCode, message: string) {
        super(`${code}: ${message}`);
        this.name = "ConfigurationError";
        this.code = code;
    }
}

export function missingReference(reference: string, reason: string): ConfigurationError {
    return new ConfigurationError("MissingRequiredReference", `'${reference}' is required ${reason}`);
}
