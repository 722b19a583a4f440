import type { EulaChallenge } from '../appliance-api';
import type { BootstrapEnvironment } from '../bootstrap-environment';
import { BootstrapStrategy } from '../bootstrap-environment';
import { SequenceError } from '../bootstrap-error';

export enum EulaHandshakePhase {
    NotStarted = 'not-started',
    FirstEulaRead = 'first-eula-read',
    FirstEulaConfirmed = 'first-eula-confirmed',
    Accepted = 'accepted'
}

export interface EulaHandshakeStrategy {
    prepare(env: BootstrapEnvironment): Promise<void>;
    apply(): Promise<EulaHandshakePhase>;
    readonly phase: EulaHandshakePhase;
}

/**
 * The two-phase EULA acceptance. Each step hands an opaque token to the next one and a step can
 * only run once the one before it has succeeded. No credential is involved: the appliance is
 * not licensed yet.
 */
export class TwoPhaseEulaHandshake extends BootstrapStrategy implements EulaHandshakeStrategy {
    private _phase: EulaHandshakePhase = EulaHandshakePhase.NotStarted;
    private firstToken: string | null = null;
    private secondToken: string | null = null;

    get phase(): EulaHandshakePhase {
        return this._phase;
    }

    prepare(env: BootstrapEnvironment): Promise<void> {
        this._phase = EulaHandshakePhase.NotStarted;
        this.firstToken = null;
        this.secondToken = null;
        return super.prepare(env);
    }

    async apply(): Promise<EulaHandshakePhase> {
        this.proxy.logAsInfo('calling TwoPhaseEulaHandshake.apply');
        await this.readFirstEula();
        await this.confirmFirstEula();
        await this.confirmSecondEula();
        this.env.eulaAccepted = true;
        this.proxy.logAsInfo('called TwoPhaseEulaHandshake.apply');
        return this._phase;
    }

    async readFirstEula(): Promise<EulaChallenge> {
        this.expectPhase(EulaHandshakePhase.NotStarted, 'readFirstEula');
        const challenge = await this.client.readFirstEula(this.env.target.connection());
        this.firstToken = this.expectToken(challenge, 'readFirstEula');
        this.logChallenge('EULA', challenge);
        this._phase = EulaHandshakePhase.FirstEulaRead;
        return challenge;
    }

    async confirmFirstEula(): Promise<EulaChallenge> {
        this.expectPhase(EulaHandshakePhase.FirstEulaRead, 'confirmFirstEula');
        if (!this.firstToken) {
            throw new SequenceError('confirmFirstEula requires the token of readFirstEula.');
        }
        const challenge = await this.client.confirmFirstEula(
            this.env.target.connection(),
            this.firstToken
        );
        this.secondToken = this.expectToken(challenge, 'confirmFirstEula');
        this.logChallenge('EULA2', challenge);
        this._phase = EulaHandshakePhase.FirstEulaConfirmed;
        return challenge;
    }

    async confirmSecondEula(): Promise<void> {
        this.expectPhase(EulaHandshakePhase.FirstEulaConfirmed, 'confirmSecondEula');
        if (!this.secondToken) {
            throw new SequenceError('confirmSecondEula requires the token of confirmFirstEula.');
        }
        // rejecting the agreement isn't supported
        await this.client.confirmSecondEula(this.env.target.connection(), this.secondToken, true);
        this.firstToken = null;
        this.secondToken = null;
        this._phase = EulaHandshakePhase.Accepted;
    }

    protected expectPhase(expected: EulaHandshakePhase, step: string): void {
        if (this._phase !== expected) {
            throw new SequenceError(
                `EULA handshake step ${step} invoked in phase ${this._phase},` +
                    ` expected phase ${expected}.`
            );
        }
    }

    protected expectToken(challenge: EulaChallenge, step: string): string {
        if (!challenge.token) {
            throw new SequenceError(`EULA handshake step ${step} returned no token.`);
        }
        return challenge.token;
    }

    protected logChallenge(label: string, challenge: EulaChallenge): void {
        this.proxy.logAsDebug(`${label} token: ${challenge.token}`);
        this.proxy.logAsDebug(`${label} text: ${challenge.text}`);
    }
}
