import { ValidationError } from './bootstrap-error';

/**
 * Enumerated value of SettingItem keys
 *
 * @export
 * @enum {string}
 */
export enum BootstrapSetting {
    AdminPrincipal = 'admin-principal',
    DebugMode = 'debug-mode',
    EulaLicenseType = 'eula-license-type',
    FactoryPassword = 'factory-password',
    LicenseDetectionRetryCount = 'license-detection-retry-count',
    LicenseDetectionRetryInterval = 'license-detection-retry-interval',
    ManagementPort = 'management-port',
    ParameterFailurePolicy = 'parameter-failure-policy',
    RequestTimeout = 'request-timeout',
    VerifyTls = 'verify-tls'
}

export enum ParameterFailurePolicy {
    Abort = 'abort',
    Continue = 'continue'
}

export type SettingValueType = 'string' | 'boolean' | 'integer' | 'enum';

export interface SettingItemDefinition {
    keyName: string;
    description: string;
    defaultValue: string;
    valueType: SettingValueType;
    /**
     * accepted values of an enum type setting
     */
    choices?: string[];
    /**
     * secret values are never printed
     */
    secret?: boolean;
}

/**
 *
 *
 * @export
 * @class SettingItem
 */
export class SettingItem {
    static NO_VALUE = 'n/a';
    /**
     *Creates an instance of SettingItem.
     * @param {string} key setting key
     * @param {string} rawValue the value stored as string type,
     * for actual type of : string, number, boolean, etc.
     * @param {string} description description of this setting item
     * @param {boolean} secret a flag for whether the value must be kept out of any output
     */
    constructor(
        readonly key: string,
        private readonly rawValue: string,
        readonly description: string,
        readonly secret: boolean = false
    ) {}
    /**
     * the string type value of the setting.
     *
     * @readonly
     * @type {string}
     */
    get value(): string | null {
        return this.rawValue.trim().toLowerCase() === SettingItem.NO_VALUE ? null : this.rawValue;
    }
    /**
     * Returns a truth value if the value of this setting is either a string 'true' or 'false'.
     * It's handy to be used in boolean comparisons.
     *
     * @readonly
     * @type {boolean}
     */
    get truthValue(): boolean {
        const value = this.value;
        return value !== null && value.trim().toLowerCase() === 'true';
    }
    /**
     * the numeric value of the setting, NaN if it is not a number.
     */
    get numberValue(): number {
        const value = this.value;
        return value === null || value.trim() === '' ? NaN : Number(value);
    }
    /**
     * stringify this SettingItem. secret values are masked.
     * @returns {string} string
     */
    stringify(): string {
        return JSON.stringify({
            key: this.key,
            value: this.secret ? '******' : this.rawValue,
            description: this.description
        });
    }
}

export type Settings = Map<string, SettingItem>;

export interface SettingItemDictionary {
    [key: string]: SettingItemDefinition;
}

export const BootstrapSettingItemDictionary: SettingItemDictionary = {};

BootstrapSettingItemDictionary[BootstrapSetting.AdminPrincipal] = {
    keyName: BootstrapSetting.AdminPrincipal,
    description: 'The administrative principal whose initial password the bootstrap sets.',
    defaultValue: 'bal',
    valueType: 'string'
};

BootstrapSettingItemDictionary[BootstrapSetting.DebugMode] = {
    keyName: BootstrapSetting.DebugMode,
    description: 'Toggle ON / OFF debug level logging, including EULA texts and tokens.',
    defaultValue: 'false',
    valueType: 'boolean'
};

BootstrapSettingItemDictionary[BootstrapSetting.EulaLicenseType] = {
    keyName: BootstrapSetting.EulaLicenseType,
    description: 'The license type sent along with the first EULA confirmation.',
    defaultValue: 'trial',
    valueType: 'string'
};

BootstrapSettingItemDictionary[BootstrapSetting.FactoryPassword] = {
    keyName: BootstrapSetting.FactoryPassword,
    description:
        'The factory default password of the administrative principal. It is used to detect' +
        ' the license state of an appliance that has not been bootstrapped yet.',
    defaultValue: '1fourall',
    valueType: 'string',
    secret: true
};

BootstrapSettingItemDictionary[BootstrapSetting.LicenseDetectionRetryCount] = {
    keyName: BootstrapSetting.LicenseDetectionRetryCount,
    description:
        'The number of additional license detection attempts after a transport failure.' +
        ' Authentication failures are never retried.',
    defaultValue: '0',
    valueType: 'integer'
};

BootstrapSettingItemDictionary[BootstrapSetting.LicenseDetectionRetryInterval] = {
    keyName: BootstrapSetting.LicenseDetectionRetryInterval,
    description: 'The interval in milliseconds between two license detection attempts.',
    defaultValue: '2000',
    valueType: 'integer'
};

BootstrapSettingItemDictionary[BootstrapSetting.ManagementPort] = {
    keyName: BootstrapSetting.ManagementPort,
    description: 'The management API port used for appliances that do not specify one.',
    defaultValue: '443',
    valueType: 'integer'
};

BootstrapSettingItemDictionary[BootstrapSetting.ParameterFailurePolicy] = {
    keyName: BootstrapSetting.ParameterFailurePolicy,
    description:
        "What to do when a parameter can't be applied: 'abort' the appliance bootstrap or" +
        " 'continue' with the next parameter and mark the appliance degraded.",
    defaultValue: ParameterFailurePolicy.Abort,
    valueType: 'enum',
    choices: [ParameterFailurePolicy.Abort, ParameterFailurePolicy.Continue]
};

BootstrapSettingItemDictionary[BootstrapSetting.RequestTimeout] = {
    keyName: BootstrapSetting.RequestTimeout,
    description: 'The timeout of a single management API request in milliseconds.',
    defaultValue: '30000',
    valueType: 'integer'
};

BootstrapSettingItemDictionary[BootstrapSetting.VerifyTls] = {
    keyName: BootstrapSetting.VerifyTls,
    description:
        'Toggle ON / OFF the verification of the appliance TLS certificate. Factory' +
        ' appliances present a self-signed certificate.',
    defaultValue: 'false',
    valueType: 'boolean'
};

/**
 * the environment variable that overrides a setting, e.g. LB_BOOTSTRAP_REQUEST_TIMEOUT
 * @param {string} key setting key
 * @returns {string} variable name
 */
export function settingEnvName(key: string): string {
    return `LB_BOOTSTRAP_${key.toUpperCase().replace(/-/g, '_')}`;
}

function validateSettingValue(definition: SettingItemDefinition, value: string): void {
    switch (definition.valueType) {
        case 'boolean':
            if (!['true', 'false'].includes(value.trim().toLowerCase())) {
                throw new ValidationError(
                    `Setting ${definition.keyName} expects true or false, got: ${value}.`
                );
            }
            break;
        case 'integer':
            if (!/^\d+$/.test(value.trim())) {
                throw new ValidationError(
                    `Setting ${definition.keyName} expects a non-negative integer, got: ${value}.`
                );
            }
            break;
        case 'enum':
            if (!(definition.choices || []).includes(value.trim())) {
                throw new ValidationError(
                    `Setting ${definition.keyName} expects one of` +
                        ` [${(definition.choices || []).join(', ')}], got: ${value}.`
                );
            }
            break;
        default:
            break;
    }
}

/**
 * Build the settings from the dictionary defaults, then the given overrides (usually the
 * settings section of the inventory), then the LB_BOOTSTRAP_* environment variables.
 * @param {{[key: string]: string}} overrides values by setting key
 * @param {NodeJS.ProcessEnv} env environment to read overrides from
 * @returns {Settings} the validated settings
 */
export function loadSettings(
    overrides: { [key: string]: string } = {},
    env: NodeJS.ProcessEnv = process.env
): Settings {
    const unknownKeys = Object.keys(overrides).filter(
        key => !Object.prototype.hasOwnProperty.call(BootstrapSettingItemDictionary, key)
    );
    if (unknownKeys.length > 0) {
        throw new ValidationError(`Unknown setting(s): ${unknownKeys.join(', ')}.`);
    }
    const settings: Settings = new Map();
    Object.values(BootstrapSettingItemDictionary).forEach(definition => {
        const fromEnv = env[settingEnvName(definition.keyName)];
        const value =
            fromEnv !== undefined
                ? fromEnv
                : overrides[definition.keyName] !== undefined
                ? overrides[definition.keyName]
                : definition.defaultValue;
        validateSettingValue(definition, value);
        settings.set(
            definition.keyName,
            new SettingItem(
                definition.keyName,
                value.trim(),
                definition.description,
                definition.secret || false
            )
        );
    });
    return settings;
}

/**
 * read a setting that loadSettings() always provides.
 * @param {Settings} settings settings
 * @param {BootstrapSetting} key setting key
 * @returns {SettingItem} the setting item
 */
export function requireSetting(settings: Settings, key: BootstrapSetting): SettingItem {
    const item = settings.get(key);
    if (!item) {
        throw new ValidationError(`Setting ${key} is missing.`);
    }
    return item;
}

export function getParameterFailurePolicy(settings: Settings): ParameterFailurePolicy {
    return requireSetting(settings, BootstrapSetting.ParameterFailurePolicy).value ===
        ParameterFailurePolicy.Continue
        ? ParameterFailurePolicy.Continue
        : ParameterFailurePolicy.Abort;
}
