import type { Connection } from './appliance';
import type { Credential } from './credential';

export enum LicenseState {
    Licensed = 'Licensed',
    Unlicensed = 'Unlicensed'
}

export interface LicenseInfo {
    state: LicenseState;
    licenseType?: string;
    expiresOn?: string;
    uuid?: string;
}

/**
 * the text of one EULA and the token the next handshake step requires
 */
export interface EulaChallenge {
    text: string;
    token: string;
}

/**
 * The management API of a single appliance. Every call either resolves or rejects with a
 * BootstrapError (TransportError, CommandRejectedError).
 */
export interface ApplianceApiClient {
    query(connection: Connection, credential?: Credential): Promise<LicenseInfo>;
    readFirstEula(connection: Connection): Promise<EulaChallenge>;
    confirmFirstEula(connection: Connection, token: string): Promise<EulaChallenge>;
    confirmSecondEula(connection: Connection, token: string, accept: boolean): Promise<void>;
    activateOnline(connection: Connection, kempId: string, kempPassword: string): Promise<void>;
    setInitialPassword(connection: Connection, password: string): Promise<void>;
    setParameter(
        connection: Connection,
        credential: Credential,
        name: string,
        value: string
    ): Promise<void>;
    setInterface(
        connection: Connection,
        credential: Credential,
        interfaceId: number,
        cidrAddress: string
    ): Promise<void>;
}
