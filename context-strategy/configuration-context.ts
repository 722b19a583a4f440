import { MANAGEMENT_INTERFACE_ID, parseCidr } from '../appliance';
import type { BootstrapEnvironment } from '../bootstrap-environment';
import { BootstrapStrategy } from '../bootstrap-environment';
import { toError } from '../bootstrap-error';
import { getParameterFailurePolicy, ParameterFailurePolicy } from '../bootstrap-setting';

export const HOSTNAME_PARAMETER = 'hostname';

export interface ParameterFailure {
    name: string;
    error: Error;
}

/**
 * To provide the logics of configuring a licensed appliance: its parameters and interfaces.
 */
export interface ParameterStrategy {
    prepare(env: BootstrapEnvironment): Promise<void>;
    applyHostname(): Promise<void>;
    /**
     * apply the parameter list in order.
     * @returns the failures tolerated under the 'continue' policy
     */
    applyParameters(): Promise<ParameterFailure[]>;
}

export interface InterfaceStrategy {
    prepare(env: BootstrapEnvironment): Promise<void>;
    apply(): Promise<void>;
}

export class SequentialParameterStrategy extends BootstrapStrategy implements ParameterStrategy {
    async applyHostname(): Promise<void> {
        this.proxy.logAsInfo('calling SequentialParameterStrategy.applyHostname');
        await this.client.setParameter(
            this.env.target.connection(),
            this.env.credentials.current,
            HOSTNAME_PARAMETER,
            this.env.appliance.hostname
        );
        this.proxy.logAsInfo('called SequentialParameterStrategy.applyHostname');
    }

    async applyParameters(): Promise<ParameterFailure[]> {
        this.proxy.logAsInfo('calling SequentialParameterStrategy.applyParameters');
        const policy = getParameterFailurePolicy(this.env.settings);
        const failures: ParameterFailure[] = [];
        for (const parameter of this.env.parameters) {
            try {
                await this.client.setParameter(
                    this.env.target.connection(),
                    this.env.credentials.current,
                    parameter.name,
                    parameter.value
                );
                this.proxy.logAsDebug(`parameter ${parameter.name} set.`);
            } catch (error) {
                if (policy === ParameterFailurePolicy.Abort) {
                    throw error;
                }
                const err = toError(error);
                this.proxy.logAsWarning(
                    `parameter ${parameter.name} not set on appliance` +
                        ` (${this.env.appliance.hostname}): ${err.message} Continue.`
                );
                failures.push({ name: parameter.name, error: err });
            }
        }
        this.proxy.logAsInfo('called SequentialParameterStrategy.applyParameters');
        return failures;
    }
}

/**
 * Assign the addresses in the given order. Once the management interface has its new address,
 * the appliance is only reachable there, so every call that follows, including those for the
 * remaining interfaces, goes to the new address.
 */
export class ManagementAwareInterfaceStrategy extends BootstrapStrategy
    implements InterfaceStrategy {
    async apply(): Promise<void> {
        this.proxy.logAsInfo('calling ManagementAwareInterfaceStrategy.apply');
        for (const assignment of this.env.appliance.interfaces) {
            // parse before the call so a malformed address never reaches the appliance
            const cidr = parseCidr(assignment.cidrAddress);
            await this.client.setInterface(
                this.env.target.connection(),
                this.env.credentials.current,
                assignment.interfaceId,
                assignment.cidrAddress
            );
            this.proxy.logAsInfo(
                `interface ${assignment.interfaceId} of appliance` +
                    ` (${this.env.appliance.hostname}) set to ${assignment.cidrAddress}.`
            );
            if (assignment.interfaceId === MANAGEMENT_INTERFACE_ID) {
                const previous = this.env.target.address;
                this.env.target.retarget(cidr.ip);
                this.proxy.logAsInfo(
                    `management address of appliance (${this.env.appliance.hostname})` +
                        ` changed: ${previous} -> ${this.env.target.address}.`
                );
            }
        }
        this.proxy.logAsInfo('called ManagementAwareInterfaceStrategy.apply');
    }
}
