import type { Connection } from '../appliance';
import { ipPortionOf } from '../appliance';
import type { ApplianceApiClient, EulaChallenge, LicenseInfo } from '../appliance-api';
import { LicenseState } from '../appliance-api';
import { CommandRejectedError, TransportError } from '../bootstrap-error';
import type { Credential } from '../credential';

export type ApiMethod = keyof ApplianceApiClient;

export interface RecordedCall {
    method: ApiMethod;
    address: string;
    port: number;
    credential?: Credential;
    args: string[];
}

/**
 * the state of one simulated appliance
 */
export interface TestAppliance {
    address: string;
    port: number;
    principal: string;
    password: string;
    licensed: boolean;
    eulaAccepted: boolean;
    initialPasswordSet: boolean;
    firstToken: string | null;
    secondToken: string | null;
    parameters: Map<string, string>;
    interfaces: Map<number, string>;
}

interface InjectedFailure {
    method: ApiMethod;
    error: Error;
    remaining: number;
    when?: (call: RecordedCall) => boolean;
}

export const TEST_FACTORY_PASSWORD = '1fourall';

/**
 * An in-process stand-in for a fleet of appliances. Every call is recorded, with the address,
 * port and credential it was sent with, before it is carried out.
 */
export class TestApplianceApiClient implements ApplianceApiClient {
    readonly calls: RecordedCall[] = [];
    private readonly appliances = new Map<string, TestAppliance>();
    private readonly failures: InjectedFailure[] = [];
    private tokenSeq = 0;

    addAppliance(
        address: string,
        options: { port?: number; licensed?: boolean; password?: string } = {}
    ): TestAppliance {
        const appliance: TestAppliance = {
            address: address,
            port: options.port || 443,
            principal: 'bal',
            password: options.password || TEST_FACTORY_PASSWORD,
            licensed: options.licensed || false,
            eulaAccepted: false,
            initialPasswordSet: false,
            firstToken: null,
            secondToken: null,
            parameters: new Map(),
            interfaces: new Map()
        };
        this.appliances.set(address, appliance);
        return appliance;
    }

    applianceAt(address: string): TestAppliance | undefined {
        return this.appliances.get(address);
    }

    /**
     * make calls of a method fail
     * @param {ApiMethod} method the method
     * @param {Error} error what to throw
     * @param {object} options how many times (default once) and for which calls
     * @returns {void}
     */
    failOn(
        method: ApiMethod,
        error: Error,
        options: { times?: number; when?: (call: RecordedCall) => boolean } = {}
    ): void {
        this.failures.push({
            method: method,
            error: error,
            remaining: options.times === undefined ? 1 : options.times,
            when: options.when
        });
    }

    callsOf(method: ApiMethod): RecordedCall[] {
        return this.calls.filter(call => call.method === method);
    }

    methods(): ApiMethod[] {
        return this.calls.map(call => call.method);
    }

    query(connection: Connection, credential?: Credential): Promise<LicenseInfo> {
        return this.handle('query', connection, credential, [], appliance => {
            this.authenticate(appliance, credential);
            return appliance.licensed
                ? { state: LicenseState.Licensed, licenseType: 'Permanent' }
                : { state: LicenseState.Unlicensed };
        });
    }

    readFirstEula(connection: Connection): Promise<EulaChallenge> {
        return this.handle('readFirstEula', connection, undefined, [], appliance => {
            appliance.firstToken = this.nextToken();
            return { text: 'End user license agreement.', token: appliance.firstToken };
        });
    }

    confirmFirstEula(connection: Connection, token: string): Promise<EulaChallenge> {
        return this.handle('confirmFirstEula', connection, undefined, [token], appliance => {
            if (!appliance.firstToken || token !== appliance.firstToken) {
                throw new CommandRejectedError('accepteula', 'Invalid magic string.', 422);
            }
            appliance.secondToken = this.nextToken();
            return { text: 'Second license agreement.', token: appliance.secondToken };
        });
    }

    confirmSecondEula(connection: Connection, token: string, accept: boolean): Promise<void> {
        return this.handle(
            'confirmSecondEula',
            connection,
            undefined,
            [token, String(accept)],
            appliance => {
                if (!appliance.secondToken || token !== appliance.secondToken) {
                    throw new CommandRejectedError('accepteula2', 'Invalid magic string.', 422);
                }
                appliance.eulaAccepted = accept;
            }
        );
    }

    activateOnline(connection: Connection, kempId: string, kempPassword: string): Promise<void> {
        return this.handle(
            'activateOnline',
            connection,
            undefined,
            [kempId, kempPassword],
            appliance => {
                if (!appliance.eulaAccepted) {
                    throw new CommandRejectedError('alsilicense', 'EULA not accepted.', 422);
                }
                appliance.licensed = true;
            }
        );
    }

    setInitialPassword(connection: Connection, password: string): Promise<void> {
        return this.handle('setInitialPassword', connection, undefined, [password], appliance => {
            if (!appliance.licensed || appliance.initialPasswordSet) {
                throw new CommandRejectedError('set_initial_passwd', 'Command not allowed.', 422);
            }
            appliance.password = password;
            appliance.initialPasswordSet = true;
        });
    }

    setParameter(
        connection: Connection,
        credential: Credential,
        name: string,
        value: string
    ): Promise<void> {
        return this.handle('setParameter', connection, credential, [name, value], appliance => {
            this.authenticate(appliance, credential);
            appliance.parameters.set(name, value);
        });
    }

    setInterface(
        connection: Connection,
        credential: Credential,
        interfaceId: number,
        cidrAddress: string
    ): Promise<void> {
        return this.handle(
            'setInterface',
            connection,
            credential,
            [String(interfaceId), cidrAddress],
            appliance => {
                this.authenticate(appliance, credential);
                appliance.interfaces.set(interfaceId, cidrAddress);
                if (interfaceId === 0) {
                    // the appliance now answers at the new address only
                    this.appliances.delete(appliance.address);
                    appliance.address = ipPortionOf(cidrAddress);
                    this.appliances.set(appliance.address, appliance);
                }
            }
        );
    }

    protected handle<T>(
        method: ApiMethod,
        connection: Connection,
        credential: Credential | undefined,
        args: string[],
        action: (appliance: TestAppliance) => T
    ): Promise<T> {
        const call: RecordedCall = {
            method: method,
            address: connection.address,
            port: connection.port,
            credential: credential,
            args: args
        };
        this.calls.push(call);
        try {
            const failure = this.failures.find(
                f => f.method === method && f.remaining > 0 && (!f.when || f.when(call))
            );
            if (failure) {
                failure.remaining--;
                throw failure.error;
            }
            const appliance = this.appliances.get(connection.address);
            if (!appliance || appliance.port !== connection.port) {
                throw new TransportError(
                    `connect ECONNREFUSED ${connection.address}:${connection.port}`
                );
            }
            return Promise.resolve(action(appliance));
        } catch (error) {
            return Promise.reject(error);
        }
    }

    protected authenticate(appliance: TestAppliance, credential?: Credential): void {
        if (
            !credential ||
            credential.principal !== appliance.principal ||
            credential.secret !== appliance.password
        ) {
            throw new TransportError('Unauthorized', true, 401);
        }
    }

    protected nextToken(): string {
        this.tokenSeq++;
        return `magic-string-${this.tokenSeq}`;
    }
}
