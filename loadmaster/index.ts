import { BootstrapSecrets } from '../bootstrap-secrets';
import { ApplianceBootstrap } from '../bootstrap-core';
import type { Settings } from '../bootstrap-setting';
import type { LoggingProxyAdapter } from '../logging-proxy';
import type { HttpTransport } from './http-transport';
import { LoadMasterApiClient } from './loadmaster-api-client';

export * from './http-transport';
export * from './loadmaster-api-client';
export * from './loadmaster-response';

/**
 * an ApplianceBootstrap talking to LoadMaster appliances
 * @param {Settings} settings loaded settings
 * @param {BootstrapSecrets} secrets secrets of the run
 * @param {LoggingProxyAdapter} proxy logging proxy
 * @param {HttpTransport} [transport] replaces the HTTPS transport
 * @returns {ApplianceBootstrap} the bootstrap
 */
export function createLoadMasterBootstrap(
    settings: Settings,
    secrets: BootstrapSecrets,
    proxy: LoggingProxyAdapter,
    transport?: HttpTransport
): ApplianceBootstrap {
    return new ApplianceBootstrap(
        LoadMasterApiClient.fromSettings(settings, proxy, transport),
        settings,
        secrets,
        proxy
    );
}
