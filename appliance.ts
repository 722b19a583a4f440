import { isIP } from 'net';
import { ValidationError } from './bootstrap-error';

/**
 * the interface whose address is also the management API address
 */
export const MANAGEMENT_INTERFACE_ID = 0;

export interface InterfaceAssignment {
    interfaceId: number;
    /**
     * ip address with prefix length, e.g. 10.0.1.31/24
     */
    cidrAddress: string;
}

export interface Appliance {
    hostname: string;
    /**
     * the management address the appliance is reachable at before the bootstrap
     */
    address: string;
    managementPort: number;
    interfaces: InterfaceAssignment[];
}

export interface Parameter {
    name: string;
    value: string;
}

/**
 * where one API call is sent to
 */
export interface Connection {
    readonly address: string;
    readonly port: number;
}

export interface Cidr {
    ip: string;
    prefixLength: number;
}

export function parseCidr(cidrAddress: string): Cidr {
    const parts = cidrAddress.trim().split('/');
    if (parts.length !== 2) {
        throw new ValidationError(`Invalid CIDR address: ${cidrAddress}. Expect <ip>/<prefix>.`);
    }
    const [ip, prefix] = parts;
    const family = isIP(ip);
    if (family === 0) {
        throw new ValidationError(`Invalid IP address in CIDR address: ${cidrAddress}.`);
    }
    const maxPrefix = family === 4 ? 32 : 128;
    if (!/^\d+$/.test(prefix) || Number(prefix) > maxPrefix) {
        throw new ValidationError(
            `Prefix length out of range in CIDR address: ${cidrAddress},` +
                ` should be [0 - ${maxPrefix}].`
        );
    }
    return { ip: ip, prefixLength: Number(prefix) };
}

export function ipPortionOf(cidrAddress: string): string {
    return parseCidr(cidrAddress).ip;
}

/**
 * The reachable management address of one appliance. It changes when the management interface
 * is readdressed, and every call made afterwards goes to the new address.
 */
export class ConnectionTarget {
    private _address: string;
    constructor(address: string, readonly port: number) {
        this._address = address;
    }

    static of(appliance: Appliance): ConnectionTarget {
        return new ConnectionTarget(appliance.address, appliance.managementPort);
    }

    get address(): string {
        return this._address;
    }

    /**
     * a snapshot of the current address, passed to a single API call
     * @returns {Connection} connection
     */
    connection(): Connection {
        return Object.freeze({ address: this._address, port: this.port });
    }

    retarget(address: string): void {
        if (isIP(address) === 0) {
            throw new ValidationError(`Cannot retarget to an invalid IP address: ${address}.`);
        }
        this._address = address;
    }

    toString(): string {
        return `${this._address}:${this.port}`;
    }
}

/**
 * Check an appliance record before any call is made to it.
 * @param {Appliance} appliance appliance to check
 * @returns {void}
 */
export function validateAppliance(appliance: Appliance): void {
    if (!appliance.hostname || !appliance.hostname.trim()) {
        throw new ValidationError('Appliance hostname is empty.');
    }
    if (isIP(appliance.address) === 0) {
        throw new ValidationError(
            `Invalid management address: ${appliance.address} (appliance: ${appliance.hostname}).`
        );
    }
    if (
        !Number.isInteger(appliance.managementPort) ||
        appliance.managementPort < 1 ||
        appliance.managementPort > 65535
    ) {
        throw new ValidationError(
            `Management port out of range: ${appliance.managementPort}, should be [1 - 65535].`
        );
    }
    const seen = new Set<number>();
    appliance.interfaces.forEach(assignment => {
        if (!Number.isInteger(assignment.interfaceId) || assignment.interfaceId < 0) {
            throw new ValidationError(
                `Invalid interface id: ${assignment.interfaceId}. Expect a non-negative integer.`
            );
        }
        if (seen.has(assignment.interfaceId)) {
            throw new ValidationError(
                `Interface ${assignment.interfaceId} is assigned more than once.`
            );
        }
        seen.add(assignment.interfaceId);
        parseCidr(assignment.cidrAddress);
    });
}
