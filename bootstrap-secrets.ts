import readline from 'readline';
import { Writable } from 'stream';
import { toError, ValidationError } from './bootstrap-error';
import { Once } from './helper-function';
import type { LoggingProxyAdapter } from './logging-proxy';

export enum SecretName {
    AdminPassword = 'admin-password',
    KempId = 'kemp-id',
    KempPassword = 'kemp-password'
}

export interface ActivationIdentity {
    kempId: string;
    kempPassword: string;
}

export interface SecretSource {
    readonly name: string;
    /**
     * @returns the secret, or null if this source doesn't have it
     */
    read(name: SecretName): Promise<string | null>;
}

export const SECRET_ENV_NAMES: { [name in SecretName]: string } = {
    [SecretName.AdminPassword]: 'LB_ADMIN_PASSWORD',
    [SecretName.KempId]: 'KEMP_ID',
    [SecretName.KempPassword]: 'KEMP_PASSWORD'
};

export class EnvironmentSecretSource implements SecretSource {
    readonly name = 'environment';
    constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}
    read(name: SecretName): Promise<string | null> {
        const value = this.env[SECRET_ENV_NAMES[name]];
        return Promise.resolve(value && value.trim() ? value : null);
    }
}

const PROMPT_LABELS: { [name in SecretName]: { label: string; hidden: boolean } } = {
    [SecretName.AdminPassword]: { label: 'Administrator (bal) password', hidden: true },
    [SecretName.KempId]: { label: 'KEMP ID', hidden: false },
    [SecretName.KempPassword]: { label: 'KEMP ID password', hidden: true }
};

/**
 * Asks on the terminal. Passwords are read without echo.
 */
export class PromptSecretSource implements SecretSource {
    readonly name = 'prompt';
    constructor(
        private readonly input: NodeJS.ReadableStream = process.stdin,
        private readonly output: NodeJS.WritableStream = process.stdout
    ) {}
    async read(name: SecretName): Promise<string | null> {
        const { label, hidden } = PROMPT_LABELS[name];
        let muted = false;
        const echo = new Writable({
            write: (chunk: Buffer | string, encoding, callback): void => {
                if (!muted) {
                    this.output.write(chunk);
                }
                callback();
            }
        });
        const rl = readline.createInterface({ input: this.input, output: echo, terminal: true });
        try {
            const answer = await new Promise<string | null>(resolve => {
                // input ended without an answer
                rl.on('close', () => resolve(null));
                rl.question(`${label}: `, resolve);
                // the prompt is written, mute what the user types
                muted = hidden;
            });
            if (hidden) {
                this.output.write('\n');
            }
            return answer && answer.trim() ? answer : null;
        } finally {
            rl.close();
        }
    }
}

/**
 * The secrets of one run. Each is resolved from the first source that has it, at most once, and
 * shared read-only by every appliance afterwards. A secret that could not be resolved stays
 * unresolved for the rest of the run: later requests fail with the same message without asking.
 */
export class BootstrapSecrets {
    private readonly adminPassword: Once<string>;
    private readonly activationIdentity: Once<ActivationIdentity>;
    constructor(readonly sources: SecretSource[], readonly proxy: LoggingProxyAdapter) {
        this.adminPassword = new Once(() => this.read(SecretName.AdminPassword));
        this.activationIdentity = new Once(async () => {
            const kempId = await this.read(SecretName.KempId);
            const kempPassword = await this.read(SecretName.KempPassword);
            return { kempId: kempId, kempPassword: kempPassword };
        });
    }

    resolveAdminPassword(): Promise<string> {
        return this.request(this.adminPassword);
    }

    /**
     * only asked for when an appliance needs online activation.
     * @returns {Promise<ActivationIdentity>} the identity
     */
    resolveActivationIdentity(): Promise<ActivationIdentity> {
        return this.request(this.activationIdentity);
    }

    protected async request<T>(secret: Once<T>): Promise<T> {
        try {
            return await secret.get();
        } catch (error) {
            const err = toError(error);
            // each appliance gets its own error to tag with its name and step
            throw err instanceof ValidationError ? new ValidationError(err.message) : err;
        }
    }

    protected async read(name: SecretName): Promise<string> {
        for (const source of this.sources) {
            const value = await source.read(name);
            if (value !== null) {
                this.proxy.logAsDebug(`secret ${name} provided by the ${source.name} source.`);
                return value;
            }
        }
        throw new ValidationError(
            `Secret ${name} is required but no source provided it.` +
                ` Set ${SECRET_ENV_NAMES[name]} or run interactively.`
        );
    }
}
