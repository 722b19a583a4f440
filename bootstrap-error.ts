/**
 * Base class of every error raised while bootstrapping an appliance. The orchestrator fills in
 * the appliance and the step once it catches the error.
 */
export class BootstrapError extends Error {
    public readonly name: string = 'BootstrapError';
    appliance?: string;
    step?: string;
    constructor(message: string) {
        super(message);
    }
}

/**
 * The appliance could not be reached, timed out, or rejected the credential.
 */
export class TransportError extends BootstrapError {
    public readonly name: string = 'TransportError';
    constructor(message: string, readonly authenticationFailed = false, readonly status?: number) {
        super(message);
    }
}

/**
 * A EULA handshake step was invoked out of order or without a valid token.
 */
export class SequenceError extends BootstrapError {
    public readonly name: string = 'SequenceError';
}

/**
 * Malformed inventory or settings. Raised before any call is made to the appliance concerned.
 */
export class ValidationError extends BootstrapError {
    public readonly name: string = 'ValidationError';
}

/**
 * The appliance answered but refused to carry out the command.
 */
export class CommandRejectedError extends BootstrapError {
    public readonly name: string = 'CommandRejectedError';
    constructor(readonly command: string, message: string, readonly status?: number) {
        super(`Command ${command} rejected: ${message}`);
    }
}

export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}
