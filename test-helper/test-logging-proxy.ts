import { LoggingProxy, LogLevel } from '../logging-proxy';

export interface LoggedMessage {
    message: string;
    level: LogLevel;
}

/**
 * keeps every message instead of printing it
 */
export class TestLoggingProxy extends LoggingProxy {
    readonly messages: LoggedMessage[] = [];
    log(message: string, level: LogLevel): void {
        this.messages.push({ message: message, level: level });
    }
    messagesAt(level: LogLevel): string[] {
        return this.messages.filter(m => m.level === level).map(m => m.message);
    }
    /**
     * whether any message at any level contains the text
     * @param {string} text text to look for
     * @returns {boolean} found or not
     */
    contains(text: string): boolean {
        return this.messages.some(m => m.message.includes(text));
    }
}
