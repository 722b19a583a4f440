import { PassThrough } from 'stream';
import { describe, it } from 'mocha';
import Sinon from 'sinon';

import { ValidationError } from '../bootstrap-error';
import {
    BootstrapSecrets,
    EnvironmentSecretSource,
    PromptSecretSource,
    SecretName
} from '../bootstrap-secrets';
import { TestLoggingProxy } from '../test-helper/test-logging-proxy';
import { TestSecretSource } from '../test-helper/test-secret-source';

describe('bootstrap secrets', () => {
    it('takes a secret from the first source that has it', async () => {
        const fallback = new TestSecretSource({ [SecretName.AdminPassword]: 'test-fallback' });
        const secrets = new BootstrapSecrets(
            [new EnvironmentSecretSource({ LB_ADMIN_PASSWORD: 'test-secret' }), fallback],
            new TestLoggingProxy()
        );
        Sinon.assert.match(await secrets.resolveAdminPassword(), 'test-secret');
        Sinon.assert.match(fallback.readCount(SecretName.AdminPassword), 0);
    });
    it('skips a blank environment variable', async () => {
        const fallback = new TestSecretSource({ [SecretName.AdminPassword]: 'test-fallback' });
        const secrets = new BootstrapSecrets(
            [new EnvironmentSecretSource({ LB_ADMIN_PASSWORD: '  ' }), fallback],
            new TestLoggingProxy()
        );
        Sinon.assert.match(await secrets.resolveAdminPassword(), 'test-fallback');
    });
    it('asks a source once per run', async () => {
        const source = new TestSecretSource({ [SecretName.AdminPassword]: 'test-secret' });
        const secrets = new BootstrapSecrets([source], new TestLoggingProxy());
        await Promise.all([secrets.resolveAdminPassword(), secrets.resolveAdminPassword()]);
        await secrets.resolveAdminPassword();
        Sinon.assert.match(source.readCount(SecretName.AdminPassword), 1);
    });
    it('resolves the activation identity only on request', async () => {
        const source = new TestSecretSource({
            [SecretName.AdminPassword]: 'test-secret',
            [SecretName.KempId]: 'test-user@example.com',
            [SecretName.KempPassword]: 'test-kemp-secret'
        });
        const secrets = new BootstrapSecrets([source], new TestLoggingProxy());
        await secrets.resolveAdminPassword();
        Sinon.assert.match(source.readCount(SecretName.KempId), 0);
        const identity = await secrets.resolveActivationIdentity();
        await secrets.resolveActivationIdentity();
        Sinon.assert.match(identity.kempId, 'test-user@example.com');
        Sinon.assert.match(identity.kempPassword, 'test-kemp-secret');
        Sinon.assert.match(source.readCount(SecretName.KempId), 1);
        Sinon.assert.match(source.readCount(SecretName.KempPassword), 1);
    });
    it('fails when no source has the secret and asks no more in the run', async () => {
        const source = new TestSecretSource({});
        const secrets = new BootstrapSecrets([source], new TestLoggingProxy());
        for (let i = 0; i < 2; i++) {
            try {
                await secrets.resolveAdminPassword();
                Sinon.assert.fail('should throw a ValidationError.');
            } catch (error) {
                Sinon.assert.match(error instanceof ValidationError, true);
                Sinon.assert.match(
                    error instanceof Error && error.message,
                    'Secret admin-password is required but no source provided it.' +
                        ' Set LB_ADMIN_PASSWORD or run interactively.'
                );
            }
        }
        Sinon.assert.match(source.readCount(SecretName.AdminPassword), 1);
    });
    it('asks for the activation identity once when the KEMP password is missing', async () => {
        const source = new TestSecretSource({ [SecretName.KempId]: 'test-user@example.com' });
        const secrets = new BootstrapSecrets([source], new TestLoggingProxy());
        const outcomes = await Promise.allSettled([
            secrets.resolveActivationIdentity(),
            secrets.resolveActivationIdentity()
        ]);
        outcomes.push(...(await Promise.allSettled([secrets.resolveActivationIdentity()])));
        outcomes.forEach(outcome => {
            Sinon.assert.match(outcome.status, 'rejected');
            Sinon.assert.match(
                outcome.status === 'rejected' && outcome.reason instanceof ValidationError,
                true
            );
        });
        Sinon.assert.match(source.readCount(SecretName.KempId), 1);
        Sinon.assert.match(source.readCount(SecretName.KempPassword), 1);
    });
    it('never logs a secret value', async () => {
        const proxy = new TestLoggingProxy();
        const secrets = new BootstrapSecrets(
            [new TestSecretSource({ [SecretName.AdminPassword]: 'test-secret' })],
            proxy
        );
        await secrets.resolveAdminPassword();
        Sinon.assert.match(proxy.contains('secret admin-password provided by the test'), true);
        Sinon.assert.match(proxy.contains('test-secret'), false);
    });
    it('reads a password from the prompt without echo', async () => {
        const input = new PassThrough();
        const output = new PassThrough();
        let written = '';
        output.on('data', (chunk: Buffer) => {
            written += chunk.toString();
        });
        const source = new PromptSecretSource(input, output);
        const answer = source.read(SecretName.KempPassword);
        input.write('test-secret\n');
        Sinon.assert.match(await answer, 'test-secret');
        Sinon.assert.match(written.includes('KEMP ID password: '), true);
        Sinon.assert.match(written.includes('test-secret'), false);
    });
    it('has no answer when the prompt input ends first', async () => {
        const input = new PassThrough();
        const source = new PromptSecretSource(input, new PassThrough());
        const answer = source.read(SecretName.AdminPassword);
        input.end();
        Sinon.assert.match((await answer) === null, true);
    });
    it('fails the admin password when the prompt input ends first', async () => {
        const input = new PassThrough();
        const secrets = new BootstrapSecrets(
            [new EnvironmentSecretSource({}), new PromptSecretSource(input, new PassThrough())],
            new TestLoggingProxy()
        );
        const password = secrets.resolveAdminPassword();
        input.end();
        try {
            await password;
            Sinon.assert.fail('should throw a ValidationError.');
        } catch (error) {
            Sinon.assert.match(error instanceof ValidationError, true);
        }
    });
});
