import { ApplianceBootstrap } from '../bootstrap-core';
import { BootstrapSecrets, SecretName } from '../bootstrap-secrets';
import type { Settings } from '../bootstrap-setting';
import { loadSettings } from '../bootstrap-setting';
import { TestApplianceApiClient } from './test-appliance-api-client';
import { TestLoggingProxy } from './test-logging-proxy';
import { TestSecretSource } from './test-secret-source';

export const TEST_ADMIN_PASSWORD = 'test-admin-secret';
export const TEST_KEMP_ID = 'test-user@example.com';
export const TEST_KEMP_PASSWORD = 'test-kemp-secret';

export const createTestSecretSource = (): TestSecretSource =>
    new TestSecretSource({
        [SecretName.AdminPassword]: TEST_ADMIN_PASSWORD,
        [SecretName.KempId]: TEST_KEMP_ID,
        [SecretName.KempPassword]: TEST_KEMP_PASSWORD
    });

export const createTestBootstrap = (
    overrides: { [key: string]: string } = {}
): {
    bootstrap: ApplianceBootstrap;
    client: TestApplianceApiClient;
    proxy: TestLoggingProxy;
    secretSource: TestSecretSource;
    secrets: BootstrapSecrets;
    settings: Settings;
} => {
    const client = new TestApplianceApiClient();
    const proxy = new TestLoggingProxy();
    const secretSource = createTestSecretSource();
    const secrets = new BootstrapSecrets([secretSource], proxy);
    // an empty environment keeps LB_BOOTSTRAP_* variables of the shell out of the tests
    const settings = loadSettings(overrides, {});
    const bootstrap = new ApplianceBootstrap(client, settings, secrets, proxy);
    return {
        bootstrap: bootstrap,
        client: client,
        proxy: proxy,
        secretSource: secretSource,
        secrets: secrets,
        settings: settings
    };
};
