import type { SecretSource } from '../bootstrap-secrets';
import { SecretName } from '../bootstrap-secrets';

/**
 * a secret source with fixed answers that counts how often each secret was asked for
 */
export class TestSecretSource implements SecretSource {
    readonly name = 'test';
    readonly reads = new Map<SecretName, number>();
    constructor(private readonly secrets: { [name in SecretName]?: string } = {}) {}
    read(name: SecretName): Promise<string | null> {
        this.reads.set(name, this.readCount(name) + 1);
        const value = this.secrets[name];
        return Promise.resolve(value === undefined ? null : value);
    }
    readCount(name: SecretName): number {
        return this.reads.get(name) || 0;
    }
}
