export enum LogLevel {
    Log = 'Log',
    Info = 'Info',
    Warn = 'Warn',
    Error = 'Error',
    Debug = 'Debug'
}

export interface LoggingProxyAdapter {
    log(message: string, level: LogLevel): void;
    logAsDebug(message: string): void;
    logAsInfo(message: string): void;
    logAsWarning(message: string): void;
    logAsError(message: string): void;
    /**
     * Output an Error level message containing the given message prefix, the error.message
     * and error.stack of the given error.
     *
     * @param {string} messagePrefix
     * @param {Error} error
     * @memberof LoggingProxyAdapter
     */
    logForError(messagePrefix: string, error: Error): void;
}

export abstract class LoggingProxy implements LoggingProxyAdapter {
    abstract log(message: string, level: LogLevel): void;
    logAsDebug(message: string): void {
        this.log(message, LogLevel.Debug);
    }
    logAsError(message: string): void {
        this.log(message, LogLevel.Error);
    }
    logAsInfo(message: string): void {
        this.log(message, LogLevel.Info);
    }
    logAsWarning(message: string): void {
        this.log(message, LogLevel.Warn);
    }
    logForError(messagePrefix: string, error: Error): void {
        const errMessage = error.message || '(no error message available)';
        const errStack = (this.withStack && error.stack && ` Error stack:${error.stack}`) || '';

        this.log(`${messagePrefix}. Error: ${errMessage}${errStack}`, LogLevel.Error);
    }
    /**
     * whether logForError() appends the error stack. Only when debugging.
     */
    protected get withStack(): boolean {
        return false;
    }
}

export class ConsoleLoggingProxy extends LoggingProxy {
    constructor(readonly debugMode: boolean = process.env.DEBUG_MODE === 'true') {
        super();
    }
    protected get withStack(): boolean {
        return this.debugMode;
    }
    log(message: string, level: LogLevel): void {
        switch (level) {
            case LogLevel.Debug:
                // debug level output only when enabled
                if (this.debugMode) {
                    console.debug(message);
                }
                break;
            case LogLevel.Error:
                console.error(message);
                break;
            case LogLevel.Info:
                console.info(message);
                break;
            case LogLevel.Warn:
                console.warn(message);
                break;
            default:
                console.log(message);
        }
    }
}

