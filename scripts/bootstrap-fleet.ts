#!/usr/bin/env node

import chalk from 'chalk';
import path from 'path';
import type { ApplianceBootstrapResult, FleetBootstrapReport } from '../bootstrap-core';
import { BootstrapState } from '../bootstrap-core';
import { toError, ValidationError } from '../bootstrap-error';
import {
    BootstrapSecrets,
    EnvironmentSecretSource,
    PromptSecretSource
} from '../bootstrap-secrets';
import {
    BootstrapSetting,
    loadSettings,
    ParameterFailurePolicy,
    requireSetting,
    settingEnvName
} from '../bootstrap-setting';
import { isRecord } from '../helper-function';
import { parseInventory, parseSettingOverrides, readInventoryDocument } from '../inventory';
import { createLoadMasterBootstrap } from '../loadmaster';
import { ConsoleLoggingProxy } from '../logging-proxy';

export const USAGE =
    'Usage: bootstrap-fleet <inventory.json> [--verbose] [--continue-on-parameter-error]';

export enum ExitCode {
    Success = 0,
    ApplianceFailed = 1,
    InvalidInput = 2
}

export interface CliOptions {
    inventoryPath: string;
    verbose: boolean;
    continueOnParameterError: boolean;
}

export function parseArguments(args: string[]): CliOptions {
    const options: CliOptions = {
        inventoryPath: '',
        verbose: false,
        continueOnParameterError: false
    };
    args.forEach(arg => {
        if (arg === '--verbose' || arg === '-v') {
            options.verbose = true;
        } else if (arg === '--continue-on-parameter-error') {
            options.continueOnParameterError = true;
        } else if (arg.startsWith('-')) {
            throw new ValidationError(`Unknown option: ${arg}. ${USAGE}`);
        } else if (options.inventoryPath) {
            throw new ValidationError(`Only one inventory file is accepted. ${USAGE}`);
        } else {
            options.inventoryPath = arg;
        }
    });
    if (!options.inventoryPath) {
        throw new ValidationError(`Inventory file is required. ${USAGE}`);
    }
    return options;
}

const STATE_COLORS: { [state in BootstrapState]: chalk.Chalk } = {
    [BootstrapState.Done]: chalk.green,
    [BootstrapState.Degraded]: chalk.yellowBright,
    [BootstrapState.Failed]: chalk.redBright
};

function formatResult(result: ApplianceBootstrapResult): string[] {
    const address =
        result.finalAddress === result.initialAddress
            ? result.initialAddress
            : `${result.initialAddress} -> ${result.finalAddress}`;
    const lines = [
        `${STATE_COLORS[result.state](result.state.padEnd(8))} ${result.hostname} (${address})`
    ];
    if (result.failedStep && result.error) {
        lines.push(`    failed at ${result.failedStep}: ${result.error.message}`);
    }
    result.parameterFailures.forEach(failure => {
        lines.push(`    parameter ${failure.name} not set: ${failure.error.message}`);
    });
    return lines;
}

export function formatReport(report: FleetBootstrapReport): string[] {
    const lines: string[] = [];
    report.results.forEach(result => lines.push(...formatResult(result)));
    lines.push(
        `${report.results.length} appliance(s): ${chalk.green(`${report.done} done`)}, ` +
            `${chalk.yellowBright(`${report.degraded} degraded`)}, ` +
            `${chalk.redBright(`${report.failed} failed`)}.`
    );
    return lines;
}

export async function main(
    args: string[] = process.argv.slice(2),
    env: NodeJS.ProcessEnv = process.env
): Promise<ExitCode> {
    let report: FleetBootstrapReport;
    try {
        const options = parseArguments(args);
        const inventoryPath = path.resolve(options.inventoryPath);
        const document = readInventoryDocument(inventoryPath);
        const settingEnv: NodeJS.ProcessEnv = options.continueOnParameterError
            ? {
                  ...env,
                  [settingEnvName(BootstrapSetting.ParameterFailurePolicy)]:
                      ParameterFailurePolicy.Continue
              }
            : env;
        const settings = loadSettings(
            parseSettingOverrides(isRecord(document) ? document.settings : undefined),
            settingEnv
        );
        const inventory = parseInventory(
            document,
            requireSetting(settings, BootstrapSetting.ManagementPort).numberValue
        );
        const proxy = new ConsoleLoggingProxy(
            options.verbose ||
                requireSetting(settings, BootstrapSetting.DebugMode).truthValue ||
                env.DEBUG_MODE === 'true'
        );
        proxy.logAsInfo(
            `inventory ${inventoryPath}: ${inventory.appliances.length} appliance(s),` +
                ` ${inventory.parameters.length} parameter(s).`
        );
        const secrets = new BootstrapSecrets(
            [new EnvironmentSecretSource(env), new PromptSecretSource()],
            proxy
        );
        report = await createLoadMasterBootstrap(settings, secrets, proxy).handleInventory(
            inventory
        );
    } catch (error) {
        const err = toError(error);
        if (err instanceof ValidationError) {
            console.error(chalk.redBright(err.message));
            return ExitCode.InvalidInput;
        }
        throw err;
    }
    console.log('');
    formatReport(report).forEach(line => console.log(line));
    return report.failed > 0 ? ExitCode.ApplianceFailed : ExitCode.Success;
}

if (require.main === module) {
    main().then(
        code => {
            process.exitCode = code;
        },
        error => {
            console.error(chalk.redBright(`Bootstrap aborted: ${toError(error).message}`));
            process.exitCode = ExitCode.ApplianceFailed;
        }
    );
}
