import type { Appliance, Parameter } from './appliance';
import { ConnectionTarget, validateAppliance } from './appliance';
import type { ApplianceApiClient } from './appliance-api';
import { LicenseState } from './appliance-api';
import type { BootstrapEnvironment } from './bootstrap-environment';
import { BootstrapError, toError } from './bootstrap-error';
import { BootstrapSecrets } from './bootstrap-secrets';
import type { Settings } from './bootstrap-setting';
import { BootstrapSetting, requireSetting } from './bootstrap-setting';
import type {
    InterfaceStrategy,
    ParameterFailure,
    ParameterStrategy
} from './context-strategy/configuration-context';
import {
    ManagementAwareInterfaceStrategy,
    SequentialParameterStrategy
} from './context-strategy/configuration-context';
import type { EulaHandshakeStrategy } from './context-strategy/eula-context';
import { TwoPhaseEulaHandshake } from './context-strategy/eula-context';
import type {
    LicenseActivationStrategy,
    LicenseDetectionStrategy
} from './context-strategy/licensing-context';
import {
    LicenseInfoDetectionStrategy,
    OnlineLicenseActivationStrategy
} from './context-strategy/licensing-context';
import { createCredential, CredentialManager } from './credential';
import type { Inventory } from './inventory';
import type { LoggingProxyAdapter } from './logging-proxy';

export enum BootstrapStep {
    Validate = 'validate',
    DetectLicense = 'detect-license',
    EulaHandshake = 'eula-handshake',
    ActivateOnline = 'activate-online',
    EstablishInitialPassword = 'establish-initial-password',
    SetHostname = 'set-hostname',
    ApplyParameters = 'apply-parameters',
    ApplyInterfaces = 'apply-interfaces'
}

export enum BootstrapState {
    Done = 'Done',
    /**
     * done, but some parameters were not applied
     */
    Degraded = 'Degraded',
    Failed = 'Failed'
}

export interface ApplianceBootstrapResult {
    hostname: string;
    initialAddress: string;
    /**
     * the management address at the end, which differs from the initial one when the
     * management interface was readdressed
     */
    finalAddress: string;
    state: BootstrapState;
    licenseState?: LicenseState;
    completedSteps: BootstrapStep[];
    failedStep?: BootstrapStep;
    error?: Error;
    parameterFailures: ParameterFailure[];
}

export interface FleetBootstrapReport {
    results: ApplianceBootstrapResult[];
    done: number;
    degraded: number;
    failed: number;
}

/**
 * To provide the appliance bootstrap logics
 */
export interface BootstrapContext {
    setLicenseDetectionStrategy(strategy: LicenseDetectionStrategy): void;
    setEulaHandshakeStrategy(strategy: EulaHandshakeStrategy): void;
    setLicenseActivationStrategy(strategy: LicenseActivationStrategy): void;
    setParameterStrategy(strategy: ParameterStrategy): void;
    setInterfaceStrategy(strategy: InterfaceStrategy): void;
    handleAppliance(
        appliance: Appliance,
        parameters: Parameter[]
    ): Promise<ApplianceBootstrapResult>;
    handleInventory(inventory: Inventory): Promise<FleetBootstrapReport>;
}

/**
 * Takes appliances one at a time from factory state to a named, licensed, parameterized and
 * addressed state:
 *
 * validate -> detect license -> (unlicensed only: EULA handshake -> online activation ->
 * initial password) -> hostname -> parameters -> interfaces.
 *
 * A failure ends the bootstrap of that appliance only. Nothing is rolled back; a rerun resumes
 * through license detection.
 */
export class ApplianceBootstrap implements BootstrapContext {
    licenseDetectionStrategy: LicenseDetectionStrategy;
    eulaHandshakeStrategy: EulaHandshakeStrategy;
    licenseActivationStrategy: LicenseActivationStrategy;
    parameterStrategy: ParameterStrategy;
    interfaceStrategy: InterfaceStrategy;
    constructor(
        readonly client: ApplianceApiClient,
        readonly settings: Settings,
        readonly secrets: BootstrapSecrets,
        readonly proxy: LoggingProxyAdapter
    ) {
        this.licenseDetectionStrategy = new LicenseInfoDetectionStrategy(client, proxy);
        this.eulaHandshakeStrategy = new TwoPhaseEulaHandshake(client, proxy);
        this.licenseActivationStrategy = new OnlineLicenseActivationStrategy(client, proxy);
        this.parameterStrategy = new SequentialParameterStrategy(client, proxy);
        this.interfaceStrategy = new ManagementAwareInterfaceStrategy(client, proxy);
    }
    setLicenseDetectionStrategy(strategy: LicenseDetectionStrategy): void {
        this.licenseDetectionStrategy = strategy;
    }
    setEulaHandshakeStrategy(strategy: EulaHandshakeStrategy): void {
        this.eulaHandshakeStrategy = strategy;
    }
    setLicenseActivationStrategy(strategy: LicenseActivationStrategy): void {
        this.licenseActivationStrategy = strategy;
    }
    setParameterStrategy(strategy: ParameterStrategy): void {
        this.parameterStrategy = strategy;
    }
    setInterfaceStrategy(strategy: InterfaceStrategy): void {
        this.interfaceStrategy = strategy;
    }

    async handleInventory(inventory: Inventory): Promise<FleetBootstrapReport> {
        this.proxy.logAsInfo('calling handleInventory.');
        // resolved once for the whole run, before any appliance is touched
        await this.secrets.resolveAdminPassword();
        const results: ApplianceBootstrapResult[] = [];
        for (const appliance of inventory.appliances) {
            results.push(await this.handleAppliance(appliance, inventory.parameters));
        }
        const report: FleetBootstrapReport = {
            results: results,
            done: results.filter(r => r.state === BootstrapState.Done).length,
            degraded: results.filter(r => r.state === BootstrapState.Degraded).length,
            failed: results.filter(r => r.state === BootstrapState.Failed).length
        };
        this.proxy.logAsInfo(
            `bootstrap of ${results.length} appliance(s) completed. done: ${report.done},` +
                ` degraded: ${report.degraded}, failed: ${report.failed}.`
        );
        this.proxy.logAsInfo('called handleInventory.');
        return report;
    }

    async handleAppliance(
        appliance: Appliance,
        parameters: Parameter[]
    ): Promise<ApplianceBootstrapResult> {
        this.proxy.logAsInfo(`calling handleAppliance (${appliance.hostname}).`);
        let env: BootstrapEnvironment | undefined;
        const result: ApplianceBootstrapResult = {
            hostname: appliance.hostname,
            initialAddress: appliance.address,
            finalAddress: appliance.address,
            state: BootstrapState.Failed,
            completedSteps: [],
            parameterFailures: []
        };
        let step = BootstrapStep.Validate;
        const complete = (): void => {
            result.completedSteps.push(step);
        };
        try {
            env = this.createEnvironment(appliance, parameters);
            validateAppliance(appliance);
            complete();

            step = BootstrapStep.DetectLicense;
            await this.licenseDetectionStrategy.prepare(env);
            env.licenseState = await this.licenseDetectionStrategy.apply();
            result.licenseState = env.licenseState;
            complete();

            if (env.licenseState === LicenseState.Unlicensed) {
                step = BootstrapStep.EulaHandshake;
                await this.eulaHandshakeStrategy.prepare(env);
                await this.eulaHandshakeStrategy.apply();
                complete();

                step = BootstrapStep.ActivateOnline;
                await this.licenseActivationStrategy.prepare(env);
                await this.licenseActivationStrategy.activate();
                complete();

                step = BootstrapStep.EstablishInitialPassword;
                await this.licenseActivationStrategy.establishInitialPassword();
                // the credential used so far is no longer valid on the appliance
                env.credentials.rotate(
                    this.adminPrincipal(),
                    await this.secrets.resolveAdminPassword()
                );
                complete();
            } else {
                this.proxy.logAsInfo(
                    `appliance (${appliance.hostname}) is already licensed.` +
                        ' Skip the licensing steps.'
                );
            }

            step = BootstrapStep.SetHostname;
            await this.parameterStrategy.prepare(env);
            await this.parameterStrategy.applyHostname();
            complete();

            step = BootstrapStep.ApplyParameters;
            result.parameterFailures = await this.parameterStrategy.applyParameters();
            complete();

            step = BootstrapStep.ApplyInterfaces;
            await this.interfaceStrategy.prepare(env);
            await this.interfaceStrategy.apply();
            complete();

            result.state =
                result.parameterFailures.length > 0 ? BootstrapState.Degraded : BootstrapState.Done;
        } catch (error) {
            const err = toError(error);
            if (err instanceof BootstrapError) {
                err.appliance = appliance.hostname;
                err.step = step;
            }
            result.state = BootstrapState.Failed;
            result.failedStep = step;
            result.error = err;
            this.proxy.logForError(
                `bootstrap of appliance (${appliance.hostname}) failed at step ${step}`,
                err
            );
        }
        if (env) {
            result.finalAddress = env.target.address;
        }
        this.proxy.logAsInfo(
            `called handleAppliance (${appliance.hostname}). state: ${result.state}.`
        );
        return result;
    }

    protected createEnvironment(
        appliance: Appliance,
        parameters: Parameter[]
    ): BootstrapEnvironment {
        const factoryPassword =
            requireSetting(this.settings, BootstrapSetting.FactoryPassword).value || '';
        return {
            appliance: appliance,
            target: ConnectionTarget.of(appliance),
            credentials: new CredentialManager(
                createCredential(this.adminPrincipal(), factoryPassword)
            ),
            parameters: parameters,
            settings: this.settings,
            secrets: this.secrets,
            eulaAccepted: false,
            activated: false,
            initialPasswordEstablished: false
        };
    }

    protected adminPrincipal(): string {
        return requireSetting(this.settings, BootstrapSetting.AdminPrincipal).value || 'bal';
    }
}
