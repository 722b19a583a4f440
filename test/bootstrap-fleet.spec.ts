import * as path from 'path';
import chalk from 'chalk';
import { describe, it } from 'mocha';
import Sinon from 'sinon';

import type { FleetBootstrapReport } from '../bootstrap-core';
import { BootstrapState, BootstrapStep } from '../bootstrap-core';
import { CommandRejectedError, ValidationError } from '../bootstrap-error';
import { ExitCode, formatReport, main, parseArguments } from '../scripts/bootstrap-fleet';

describe('bootstrap-fleet command', () => {
    let chalkLevel: chalk.Level;
    before(function() {
        chalkLevel = chalk.level;
        chalk.level = 0;
    });
    after(function() {
        chalk.level = chalkLevel;
    });
    it('parses the arguments', () => {
        const options = parseArguments([
            'inventory.json',
            '--verbose',
            '--continue-on-parameter-error'
        ]);
        Sinon.assert.match(options.inventoryPath, 'inventory.json');
        Sinon.assert.match(options.verbose, true);
        Sinon.assert.match(options.continueOnParameterError, true);
        Sinon.assert.match(parseArguments(['inventory.json']).verbose, false);
    });
    it('rejects missing or unknown arguments', () => {
        [[], ['--dry-run', 'inventory.json'], ['a.json', 'b.json']].forEach(args => {
            try {
                parseArguments(args);
                Sinon.assert.fail('should throw a ValidationError.');
            } catch (error) {
                Sinon.assert.match(error instanceof ValidationError, true);
            }
        });
    });
    it('formats the report', () => {
        const report: FleetBootstrapReport = {
            results: [
                {
                    hostname: 'KEMP1',
                    initialAddress: '10.0.1.109',
                    finalAddress: '10.0.1.31',
                    state: BootstrapState.Done,
                    completedSteps: [],
                    parameterFailures: []
                },
                {
                    hostname: 'KEMP2',
                    initialAddress: '10.0.1.110',
                    finalAddress: '10.0.1.110',
                    state: BootstrapState.Failed,
                    completedSteps: [],
                    failedStep: BootstrapStep.SetHostname,
                    error: new CommandRejectedError('set', 'Invalid hostname'),
                    parameterFailures: []
                }
            ],
            done: 1,
            degraded: 0,
            failed: 1
        };
        Sinon.assert.match(
            formatReport(report),
            Sinon.match.array.deepEquals([
                'Done     KEMP1 (10.0.1.109 -> 10.0.1.31)',
                'Failed   KEMP2 (10.0.1.110)',
                '    failed at set-hostname: Command set rejected: Invalid hostname',
                '2 appliance(s): 1 done, 0 degraded, 1 failed.'
            ])
        );
    });
    it('exits with the invalid input code before touching any appliance', async () => {
        const stub = Sinon.stub(console, 'error');
        try {
            const code = await main(
                [path.resolve(__dirname, 'no-such-inventory.json')],
                {}
            );
            Sinon.assert.match(code, ExitCode.InvalidInput);
            Sinon.assert.match(stub.calledOnce, true);
        } finally {
            stub.restore();
        }
    });
});
