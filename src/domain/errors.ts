/**
 * Base class for failures that end the CLI run.
 * `hints` are extra lines printed under the error message.
 */
export class CliError extends Error {
    public readonly exitCode: number = 1;

    constructor(
        message: string,
        public readonly hints: readonly string[] = []
    ) {
        super(message);
        this.name = 'CliError';
    }
}

/**
 * Bad flag value, unsupported language or malformed audio source.
 */
export class InvalidArgumentError extends CliError {
    constructor(message: string, hints: readonly string[] = []) {
        super(message, hints);
        this.name = 'InvalidArgumentError';
    }
}

/**
 * Local audio file does not exist.
 */
export class NotFoundError extends CliError {
    constructor(message: string = 'File not found', hints: readonly string[] = []) {
        super(message, hints);
        this.name = 'NotFoundError';
    }
}

/**
 * ffmpeg is missing or could not produce a WAV file.
 */
export class ConversionError extends CliError {
    constructor(message: string, hints: readonly string[] = []) {
        super(message, hints);
        this.name = 'ConversionError';
    }
}

/**
 * API key file missing, empty, or bad environment configuration.
 */
export class ConfigError extends CliError {
    constructor(message: string, hints: readonly string[] = []) {
        super(message, hints);
        this.name = 'ConfigError';
    }
}

/**
 * The request never got a response.
 */
export class NetworkError extends CliError {
    constructor(message: string, hints: readonly string[] = []) {
        super(message, hints);
        this.name = 'NetworkError';
    }
}

/**
 * The API answered with an error.
 */
export class ApiError extends CliError {
    constructor(
        message: string,
        public readonly status?: number,
        hints: readonly string[] = []
    ) {
        super(message, hints);
        this.name = 'ApiError';
    }
}
