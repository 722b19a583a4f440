import fs from 'fs';
import type { Appliance, InterfaceAssignment, Parameter } from './appliance';
import { ValidationError } from './bootstrap-error';
import { isRecord } from './helper-function';

export interface Inventory {
    appliances: Appliance[];
    /**
     * applied uniformly to every appliance, in this order, after the hostname
     */
    parameters: Parameter[];
    /**
     * setting overrides by setting key
     */
    settings: { [key: string]: string };
}

type Scalar = string | number | boolean;

function isScalar(value: unknown): value is Scalar {
    return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function parseInterface(raw: unknown, where: string): InterfaceAssignment {
    if (!isRecord(raw)) {
        throw new ValidationError(`${where}: expect an object.`);
    }
    if (typeof raw.interfaceId !== 'number') {
        throw new ValidationError(`${where}: interfaceId must be a number.`);
    }
    if (typeof raw.cidrAddress !== 'string') {
        throw new ValidationError(`${where}: cidrAddress must be a string.`);
    }
    return { interfaceId: raw.interfaceId, cidrAddress: raw.cidrAddress };
}

function parseAppliance(raw: unknown, index: number, defaultPort: number): Appliance {
    const where = `appliances[${index}]`;
    if (!isRecord(raw)) {
        throw new ValidationError(`${where}: expect an object.`);
    }
    if (typeof raw.hostname !== 'string') {
        throw new ValidationError(`${where}: hostname must be a string.`);
    }
    if (typeof raw.address !== 'string') {
        throw new ValidationError(`${where}: address must be a string.`);
    }
    if (raw.managementPort !== undefined && typeof raw.managementPort !== 'number') {
        throw new ValidationError(`${where}: managementPort must be a number.`);
    }
    const interfaces = raw.interfaces === undefined ? [] : raw.interfaces;
    if (!Array.isArray(interfaces)) {
        throw new ValidationError(`${where}: interfaces must be an array.`);
    }
    return {
        hostname: raw.hostname,
        address: raw.address,
        managementPort: raw.managementPort === undefined ? defaultPort : raw.managementPort,
        interfaces: interfaces.map((item, i) => parseInterface(item, `${where}.interfaces[${i}]`))
    };
}

function parseParameters(raw: unknown): Parameter[] {
    let parameters: Parameter[];
    if (raw === undefined) {
        parameters = [];
    } else if (Array.isArray(raw)) {
        parameters = raw.map((item, i) => {
            if (!isRecord(item) || typeof item.name !== 'string' || !isScalar(item.value)) {
                throw new ValidationError(
                    `parameters[${i}]: expect { "name": string, "value": string }.`
                );
            }
            return { name: item.name, value: String(item.value) };
        });
    } else if (isRecord(raw)) {
        parameters = Object.entries(raw).map(([name, value]) => {
            if (!isScalar(value)) {
                throw new ValidationError(`parameters.${name}: expect a scalar value.`);
            }
            return { name: name, value: String(value) };
        });
    } else {
        throw new ValidationError('parameters must be an array or an object.');
    }
    parameters.forEach(parameter => {
        if (!parameter.name.trim()) {
            throw new ValidationError('Parameter name is empty.');
        }
        // the hostname comes from each appliance and is always set first
        if (parameter.name === 'hostname') {
            throw new ValidationError(
                "Parameter 'hostname' can't be in the parameter list. Set it per appliance."
            );
        }
    });
    return parameters;
}

export function parseSettingOverrides(raw: unknown): { [key: string]: string } {
    if (raw === undefined) {
        return {};
    }
    if (!isRecord(raw)) {
        throw new ValidationError('settings must be an object.');
    }
    const settings: { [key: string]: string } = {};
    Object.entries(raw).forEach(([key, value]) => {
        if (!isScalar(value)) {
            throw new ValidationError(`settings.${key}: expect a scalar value.`);
        }
        settings[key] = String(value);
    });
    return settings;
}

/**
 * Read the structure of an inventory document. Semantic checks on each appliance (addresses,
 * CIDR, interface ids) are left to validateAppliance() so that one bad record doesn't stop the
 * others.
 * @param {unknown} document parsed JSON document
 * @param {number} defaultPort management port for appliances that omit it
 * @returns {Inventory} inventory
 */
export function parseInventory(document: unknown, defaultPort = 443): Inventory {
    if (!isRecord(document)) {
        throw new ValidationError('Inventory must be a JSON object.');
    }
    const appliances: unknown = document.appliances;
    if (!Array.isArray(appliances)) {
        throw new ValidationError('Inventory must contain an appliances array.');
    }
    return {
        appliances: appliances.map((raw, index) => parseAppliance(raw, index, defaultPort)),
        parameters: parseParameters(document.parameters),
        settings: parseSettingOverrides(document.settings)
    };
}

/**
 * read the raw JSON document of an inventory file
 * @param {string} filePath path to the file
 * @returns {unknown} parsed document
 */
export function readInventoryDocument(filePath: string): unknown {
    if (!fs.existsSync(filePath)) {
        throw new ValidationError(`Inventory file not found: ${filePath}.`);
    }
    try {
        return JSON.parse(String(fs.readFileSync(filePath)));
    } catch (error) {
        throw new ValidationError(
            `Inventory file ${filePath} isn't valid JSON: ${
                error instanceof Error ? error.message : String(error)
            }`
        );
    }
}
