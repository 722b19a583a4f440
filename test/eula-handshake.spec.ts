import { describe, it } from 'mocha';
import Sinon from 'sinon';

import type { Appliance } from '../appliance';
import { ConnectionTarget } from '../appliance';
import type { BootstrapEnvironment } from '../bootstrap-environment';
import { SequenceError } from '../bootstrap-error';
import { BootstrapSecrets } from '../bootstrap-secrets';
import { loadSettings } from '../bootstrap-setting';
import { EulaHandshakePhase, TwoPhaseEulaHandshake } from '../context-strategy/eula-context';
import { createCredential, CredentialManager } from '../credential';
import { LogLevel } from '../logging-proxy';
import { TestApplianceApiClient } from '../test-helper/test-appliance-api-client';
import { TestLoggingProxy } from '../test-helper/test-logging-proxy';
import { createTestSecretSource } from '../test-helper/test-helper-function';

const TEST_APPLIANCE: Appliance = {
    hostname: 'KEMP1',
    address: '10.0.1.109',
    managementPort: 443,
    interfaces: []
};

const createEnvironment = (proxy: TestLoggingProxy): BootstrapEnvironment => ({
    appliance: TEST_APPLIANCE,
    target: ConnectionTarget.of(TEST_APPLIANCE),
    credentials: new CredentialManager(createCredential('bal', '1fourall')),
    parameters: [],
    settings: loadSettings({}, {}),
    secrets: new BootstrapSecrets([createTestSecretSource()], proxy),
    eulaAccepted: false,
    activated: false,
    initialPasswordEstablished: false
});

const expectSequenceError = async (promise: Promise<unknown>): Promise<void> => {
    try {
        await promise;
    } catch (error) {
        Sinon.assert.match(error instanceof SequenceError, true);
        return;
    }
    Sinon.assert.fail('should throw a SequenceError.');
};

describe('two-phase EULA handshake', () => {
    let client: TestApplianceApiClient;
    let proxy: TestLoggingProxy;
    let env: BootstrapEnvironment;
    let handshake: TwoPhaseEulaHandshake;
    beforeEach(async () => {
        client = new TestApplianceApiClient();
        client.addAppliance('10.0.1.109');
        proxy = new TestLoggingProxy();
        env = createEnvironment(proxy);
        handshake = new TwoPhaseEulaHandshake(client, proxy);
        await handshake.prepare(env);
    });
    it('passes each token verbatim to the next step', async () => {
        const phase = await handshake.apply();
        Sinon.assert.match(phase, EulaHandshakePhase.Accepted);
        Sinon.assert.match(env.eulaAccepted, true);
        Sinon.assert.match(
            client.methods(),
            Sinon.match.array.deepEquals(['readFirstEula', 'confirmFirstEula', 'confirmSecondEula'])
        );
        Sinon.assert.match(client.calls[1].args[0], 'magic-string-1');
        Sinon.assert.match(client.calls[2].args[0], 'magic-string-2');
        Sinon.assert.match(client.calls[2].args[1], 'true');
        // pre-authentication: no credential is sent
        Sinon.assert.match(
            client.calls.every(call => call.credential === undefined),
            true
        );
        Sinon.assert.match(client.applianceAt('10.0.1.109')?.eulaAccepted, true);
    });
    it('refuses to confirm before reading', async () => {
        await expectSequenceError(handshake.confirmFirstEula());
        await expectSequenceError(handshake.confirmSecondEula());
        Sinon.assert.match(client.calls.length, 0);
        Sinon.assert.match(handshake.phase, EulaHandshakePhase.NotStarted);
    });
    it('refuses the second confirmation before the first one', async () => {
        await handshake.readFirstEula();
        await expectSequenceError(handshake.confirmSecondEula());
        Sinon.assert.match(client.methods(), Sinon.match.array.deepEquals(['readFirstEula']));
        Sinon.assert.match(handshake.phase, EulaHandshakePhase.FirstEulaRead);
    });
    it('refuses to read twice', async () => {
        await handshake.readFirstEula();
        await expectSequenceError(handshake.readFirstEula());
        Sinon.assert.match(client.calls.length, 1);
    });
    it('stops when a step returns no token', async () => {
        const stub = Sinon.stub(client, 'readFirstEula').callsFake(() =>
            Promise.resolve({ text: 'End user license agreement.', token: '' })
        );
        try {
            await expectSequenceError(handshake.apply());
            Sinon.assert.match(stub.calledOnce, true);
            Sinon.assert.match(client.callsOf('confirmFirstEula').length, 0);
            Sinon.assert.match(env.eulaAccepted, false);
        } finally {
            stub.restore();
        }
    });
    it('stays in its phase when a step fails', async () => {
        client.failOn('confirmFirstEula', new Error('connection reset'));
        await handshake.readFirstEula();
        try {
            await handshake.confirmFirstEula();
            Sinon.assert.fail('should throw.');
        } catch (error) {
            Sinon.assert.match(error instanceof Error && error.message, 'connection reset');
        }
        Sinon.assert.match(handshake.phase, EulaHandshakePhase.FirstEulaRead);
        await expectSequenceError(handshake.confirmSecondEula());
        Sinon.assert.match(client.callsOf('confirmSecondEula').length, 0);
    });
    it('starts over when prepared again', async () => {
        await handshake.readFirstEula();
        await handshake.prepare(env);
        Sinon.assert.match(handshake.phase, EulaHandshakePhase.NotStarted);
        await handshake.apply();
        Sinon.assert.match(client.calls[2].args[0], 'magic-string-2');
        Sinon.assert.match(client.calls[3].args[0], 'magic-string-3');
    });
    it('logs EULA tokens at debug level only', async () => {
        await handshake.apply();
        const nonDebug = proxy.messages.filter(m => m.level !== LogLevel.Debug);
        Sinon.assert.match(
            nonDebug.some(m => m.message.includes('magic-string')),
            false
        );
        Sinon.assert.match(
            proxy.messagesAt(LogLevel.Debug).includes('EULA token: magic-string-1'),
            true
        );
    });
    it('requires prepare() before apply()', async () => {
        await expectSequenceError(new TwoPhaseEulaHandshake(client, proxy).apply());
    });
});
