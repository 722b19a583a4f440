import type { Appliance, Parameter } from './appliance';
import { ConnectionTarget } from './appliance';
import type { ApplianceApiClient } from './appliance-api';
import { LicenseState } from './appliance-api';
import { SequenceError } from './bootstrap-error';
import { BootstrapSecrets } from './bootstrap-secrets';
import type { Settings } from './bootstrap-setting';
import { CredentialManager } from './credential';
import type { LoggingProxyAdapter } from './logging-proxy';

/**
 * Everything the strategies share while one appliance is bootstrapped. Created by the
 * orchestrator for each appliance and discarded afterwards.
 */
export interface BootstrapEnvironment {
    appliance: Appliance;
    target: ConnectionTarget;
    credentials: CredentialManager;
    parameters: Parameter[];
    settings: Settings;
    secrets: BootstrapSecrets;
    licenseState?: LicenseState;
    eulaAccepted: boolean;
    activated: boolean;
    initialPasswordEstablished: boolean;
}

/**
 * Base of the strategies driving one part of the bootstrap through the appliance API.
 */
export abstract class BootstrapStrategy {
    private _env: BootstrapEnvironment | null = null;
    constructor(readonly client: ApplianceApiClient, readonly proxy: LoggingProxyAdapter) {}
    prepare(env: BootstrapEnvironment): Promise<void> {
        this._env = env;
        return Promise.resolve();
    }
    protected get env(): BootstrapEnvironment {
        if (!this._env) {
            throw new SequenceError(`${this.constructor.name} is applied before prepare().`);
        }
        return this._env;
    }
}
