import type { LicenseInfo } from '../appliance-api';
import { LicenseState } from '../appliance-api';
import type { BootstrapEnvironment } from '../bootstrap-environment';
import { BootstrapStrategy } from '../bootstrap-environment';
import { SequenceError, TransportError } from '../bootstrap-error';
import { BootstrapSetting, requireSetting } from '../bootstrap-setting';
import type { Credential } from '../credential';
import { createCredential } from '../credential';
import { retry } from '../helper-function';

/**
 * To provide license related logics: detecting whether an appliance needs the licensing steps
 * and carrying them out.
 */
export interface LicenseDetectionStrategy {
    prepare(env: BootstrapEnvironment): Promise<void>;
    apply(): Promise<LicenseState>;
}

export interface LicenseActivationStrategy {
    prepare(env: BootstrapEnvironment): Promise<void>;
    /**
     * retrieve the license online. The EULA must have been accepted.
     */
    activate(): Promise<void>;
    /**
     * set the password of the administrative principal. Once per appliance, after activate().
     */
    establishInitialPassword(): Promise<void>;
}

export class LicenseInfoDetectionStrategy extends BootstrapStrategy
    implements LicenseDetectionStrategy {
    async apply(): Promise<LicenseState> {
        this.proxy.logAsInfo('calling LicenseInfoDetectionStrategy.apply');
        let info: LicenseInfo;
        try {
            info = await this.query(this.env.credentials.current);
        } catch (error) {
            if (!(error instanceof TransportError && error.authenticationFailed)) {
                throw error;
            }
            info = await this.queryAsAdministrator(error);
        }
        this.proxy.logAsInfo(
            `appliance (${this.env.appliance.hostname}) is ${info.state.toLowerCase()}` +
                `${info.licenseType ? ` (license type: ${info.licenseType})` : ''}.`
        );
        this.proxy.logAsInfo('called LicenseInfoDetectionStrategy.apply');
        return info.state;
    }
    protected query(credential: Credential): Promise<LicenseInfo> {
        const retryCount = requireSetting(
            this.env.settings,
            BootstrapSetting.LicenseDetectionRetryCount
        ).numberValue;
        const interval = requireSetting(
            this.env.settings,
            BootstrapSetting.LicenseDetectionRetryInterval
        ).numberValue;
        return retry(
            () => this.client.query(this.env.target.connection(), credential),
            // a rejected credential won't be accepted on the next attempt either
            error => error instanceof TransportError && !error.authenticationFailed,
            retryCount,
            interval,
            this.proxy
        );
    }
    /**
     * The factory credential stops working once the initial password is set. An appliance
     * accepting the administrative credential instead was bootstrapped before, and that
     * credential becomes the current one.
     * @param {TransportError} rejection the authentication failure of the factory credential
     * @returns {Promise<LicenseInfo>} license info
     */
    protected async queryAsAdministrator(rejection: TransportError): Promise<LicenseInfo> {
        const principal = requireSetting(this.env.settings, BootstrapSetting.AdminPrincipal).value;
        const password = await this.env.secrets.resolveAdminPassword();
        const current = this.env.credentials.current;
        if (!principal || (current.principal === principal && current.secret === password)) {
            throw rejection;
        }
        this.proxy.logAsInfo(
            `credential of ${current.principal} rejected by appliance` +
                ` (${this.env.appliance.hostname}). Retry with the administrative credential.`
        );
        const info = await this.query(createCredential(principal, password));
        this.env.credentials.rotate(principal, password);
        return info;
    }
}

export class OnlineLicenseActivationStrategy extends BootstrapStrategy
    implements LicenseActivationStrategy {
    async activate(): Promise<void> {
        this.proxy.logAsInfo('calling OnlineLicenseActivationStrategy.activate');
        if (!this.env.eulaAccepted) {
            throw new SequenceError('Online activation requires the EULA to be accepted first.');
        }
        const identity = await this.env.secrets.resolveActivationIdentity();
        await this.client.activateOnline(
            this.env.target.connection(),
            identity.kempId,
            identity.kempPassword
        );
        this.env.activated = true;
        this.proxy.logAsInfo('called OnlineLicenseActivationStrategy.activate');
    }
    async establishInitialPassword(): Promise<void> {
        this.proxy.logAsInfo('calling OnlineLicenseActivationStrategy.establishInitialPassword');
        if (!this.env.activated) {
            throw new SequenceError('The initial password can only be set after activation.');
        }
        if (this.env.initialPasswordEstablished) {
            throw new SequenceError('The initial password has already been set.');
        }
        const password = await this.env.secrets.resolveAdminPassword();
        await this.client.setInitialPassword(this.env.target.connection(), password);
        this.env.initialPasswordEstablished = true;
        this.proxy.logAsInfo('called OnlineLicenseActivationStrategy.establishInitialPassword');
    }
}
