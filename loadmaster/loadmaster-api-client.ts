import { StatusCodes } from 'http-status-codes';
import type { Connection } from '../appliance';
import type { ApplianceApiClient, EulaChallenge, LicenseInfo } from '../appliance-api';
import { LicenseState } from '../appliance-api';
import { CommandRejectedError, toError, TransportError } from '../bootstrap-error';
import type { Settings } from '../bootstrap-setting';
import { BootstrapSetting, requireSetting } from '../bootstrap-setting';
import type { Credential } from '../credential';
import type { LoggingProxyAdapter } from '../logging-proxy';
import type { HttpTransport } from './http-transport';
import { HttpsTransport } from './http-transport';
import type { LoadMasterResponse } from './loadmaster-response';
import { parseLoadMasterResponse, readText } from './loadmaster-response';

/**
 * query parameters whose values never appear in a log
 */
export const SECRET_QUERY_PARAMETERS = ['kempid', 'passwd', 'password'];

/**
 * how an appliance without a license refuses the licenseinfo command
 */
const UNLICENSED_PATTERN = /licen[cs]e required|not licen[cs]ed|no licen[cs]e|eula/i;

export enum LoadMasterCommand {
    LicenseInfo = 'licenseinfo',
    ReadEula = 'readeula',
    AcceptEula = 'accepteula',
    AcceptEula2 = 'accepteula2',
    AlsiLicense = 'alsilicense',
    SetInitialPassword = 'set_initial_passwd',
    Set = 'set',
    ModifyInterface = 'modiface'
}

export interface LoadMasterApiClientOptions {
    /**
     * milliseconds
     */
    timeout: number;
    verifyTls: boolean;
    /**
     * license type sent with the first EULA confirmation
     */
    eulaLicenseType: string;
}

export function redactQuery(params: { [name: string]: string }): string {
    const redacted: { [name: string]: string } = {};
    Object.entries(params).forEach(([name, value]) => {
        redacted[name] = SECRET_QUERY_PARAMETERS.includes(name.toLowerCase()) ? '******' : value;
    });
    return new URLSearchParams(redacted).toString();
}

function hostOf(connection: Connection): string {
    return connection.address.includes(':') ? `[${connection.address}]` : connection.address;
}

/**
 * Client of the LoadMaster /access management API: HTTPS GET requests with basic
 * authentication, answered in XML.
 */
export class LoadMasterApiClient implements ApplianceApiClient {
    constructor(
        readonly options: LoadMasterApiClientOptions,
        readonly proxy: LoggingProxyAdapter,
        readonly transport: HttpTransport = new HttpsTransport()
    ) {}

    static fromSettings(
        settings: Settings,
        proxy: LoggingProxyAdapter,
        transport?: HttpTransport
    ): LoadMasterApiClient {
        return new LoadMasterApiClient(
            {
                timeout: requireSetting(settings, BootstrapSetting.RequestTimeout).numberValue,
                verifyTls: requireSetting(settings, BootstrapSetting.VerifyTls).truthValue,
                eulaLicenseType:
                    requireSetting(settings, BootstrapSetting.EulaLicenseType).value || 'trial'
            },
            proxy,
            transport
        );
    }

    async query(connection: Connection, credential?: Credential): Promise<LicenseInfo> {
        const response = await this.command(
            connection,
            LoadMasterCommand.LicenseInfo,
            {},
            credential
        );
        if (response.success) {
            return {
                state: LicenseState.Licensed,
                licenseType: readText(response.data.LicenseType),
                expiresOn: readText(response.data.LicensedUntil),
                uuid: readText(response.data.UUID)
            };
        }
        if (UNLICENSED_PATTERN.test(response.message)) {
            return { state: LicenseState.Unlicensed };
        }
        throw new CommandRejectedError(
            LoadMasterCommand.LicenseInfo,
            response.message,
            response.status
        );
    }

    async readFirstEula(connection: Connection): Promise<EulaChallenge> {
        const response = this.expectSuccess(
            LoadMasterCommand.ReadEula,
            await this.command(connection, LoadMasterCommand.ReadEula, {})
        );
        return this.toChallenge(LoadMasterCommand.ReadEula, response, 'Eula');
    }

    async confirmFirstEula(connection: Connection, token: string): Promise<EulaChallenge> {
        const response = this.expectSuccess(
            LoadMasterCommand.AcceptEula,
            await this.command(connection, LoadMasterCommand.AcceptEula, {
                type: this.options.eulaLicenseType,
                magic: token
            })
        );
        return this.toChallenge(LoadMasterCommand.AcceptEula, response, 'Eula2');
    }

    async confirmSecondEula(connection: Connection, token: string, accept: boolean): Promise<void> {
        this.expectSuccess(
            LoadMasterCommand.AcceptEula2,
            await this.command(connection, LoadMasterCommand.AcceptEula2, {
                magic: token,
                accept: accept ? 'yes' : 'no'
            })
        );
    }

    async activateOnline(
        connection: Connection,
        kempId: string,
        kempPassword: string
    ): Promise<void> {
        this.expectSuccess(
            LoadMasterCommand.AlsiLicense,
            await this.command(connection, LoadMasterCommand.AlsiLicense, {
                kempid: kempId,
                password: kempPassword
            })
        );
    }

    async setInitialPassword(connection: Connection, password: string): Promise<void> {
        this.expectSuccess(
            LoadMasterCommand.SetInitialPassword,
            await this.command(connection, LoadMasterCommand.SetInitialPassword, {
                passwd: password
            })
        );
    }

    async setParameter(
        connection: Connection,
        credential: Credential,
        name: string,
        value: string
    ): Promise<void> {
        this.expectSuccess(
            LoadMasterCommand.Set,
            await this.command(
                connection,
                LoadMasterCommand.Set,
                { param: name, value: value },
                credential
            )
        );
    }

    async setInterface(
        connection: Connection,
        credential: Credential,
        interfaceId: number,
        cidrAddress: string
    ): Promise<void> {
        this.expectSuccess(
            LoadMasterCommand.ModifyInterface,
            await this.command(
                connection,
                LoadMasterCommand.ModifyInterface,
                { interface: String(interfaceId), addr: cidrAddress },
                credential
            )
        );
    }

    /**
     * send one command and parse the answer. Only unreachable appliances, rejected credentials
     * and unreadable answers throw here; a refused command is returned to the caller.
     * @param {Connection} connection where to send
     * @param {LoadMasterCommand} command command name
     * @param {{[name: string]: string}} params query parameters
     * @param {Credential} [credential] basic authentication credential
     * @returns {Promise<LoadMasterResponse>} the parsed answer
     */
    protected async command(
        connection: Connection,
        command: LoadMasterCommand,
        params: { [name: string]: string },
        credential?: Credential
    ): Promise<LoadMasterResponse> {
        const query = new URLSearchParams(params).toString();
        const path = `/access/${command}${query ? `?${query}` : ''}`;
        const headers: { [name: string]: string } = {};
        if (credential) {
            headers.Authorization = `Basic ${Buffer.from(
                `${credential.principal}:${credential.secret}`
            ).toString('base64')}`;
        }
        const redacted = redactQuery(params);
        this.proxy.logAsDebug(
            `GET https://${hostOf(connection)}:${connection.port}/access/${command}` +
                `${redacted ? `?${redacted}` : ''}`
        );
        let statusCode: number;
        let body: string;
        try {
            ({ statusCode, body } = await this.transport.send({
                hostname: connection.address,
                port: connection.port,
                path: path,
                headers: headers,
                timeout: this.options.timeout,
                rejectUnauthorized: this.options.verifyTls
            }));
        } catch (error) {
            throw new TransportError(
                `Appliance ${hostOf(connection)}:${connection.port} unreachable` +
                    ` (${command}): ${toError(error).message}`
            );
        }
        if (statusCode === StatusCodes.UNAUTHORIZED) {
            throw new TransportError(
                `Appliance ${hostOf(connection)}:${connection.port} rejected the credential` +
                    ` (${command}).`,
                true,
                statusCode
            );
        }
        try {
            const response = await parseLoadMasterResponse(body);
            this.proxy.logAsDebug(
                `${command} answered: status ${response.status}, code ${response.code}.`
            );
            return response;
        } catch (error) {
            throw new TransportError(
                `Unreadable answer from appliance ${hostOf(connection)}:${connection.port}` +
                    ` (${command}, HTTP status ${statusCode}): ${toError(error).message}`,
                false,
                statusCode
            );
        }
    }

    protected expectSuccess(
        command: LoadMasterCommand,
        response: LoadMasterResponse
    ): LoadMasterResponse {
        if (!response.success) {
            throw new CommandRejectedError(command, response.message, response.status);
        }
        return response;
    }

    protected toChallenge(
        command: LoadMasterCommand,
        response: LoadMasterResponse,
        textElement: string
    ): EulaChallenge {
        const token = readText(response.data.MagicString);
        if (!token) {
            throw new CommandRejectedError(command, 'the answer carries no MagicString.');
        }
        return { text: readText(response.data[textElement]) || '', token: token };
    }
}
