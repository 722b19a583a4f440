import * as path from 'path';
import { describe, it } from 'mocha';
import Sinon from 'sinon';

import { ValidationError } from '../bootstrap-error';
import { parseInventory, parseSettingOverrides, readInventoryDocument } from '../inventory';

const expectValidationError = (fn: () => unknown, message?: string): void => {
    try {
        fn();
    } catch (error) {
        Sinon.assert.match(error instanceof ValidationError, true);
        if (message !== undefined && error instanceof Error) {
            Sinon.assert.match(error.message, message);
        }
        return;
    }
    Sinon.assert.fail('should throw a ValidationError.');
};

describe('inventory', () => {
    it('reads appliances, parameters and settings', () => {
        const inventory = parseInventory({
            settings: { 'parameter-failure-policy': 'continue', 'request-timeout': 10000 },
            parameters: [
                { name: 'ntphost', value: '10.0.1.1' },
                { name: 'sshport', value: 22 }
            ],
            appliances: [
                {
                    hostname: 'KEMP1',
                    address: '10.0.1.109',
                    managementPort: 8443,
                    interfaces: [{ interfaceId: 0, cidrAddress: '10.0.1.31/24' }]
                },
                { hostname: 'KEMP2', address: '10.0.1.110' }
            ]
        });
        Sinon.assert.match(inventory.appliances.length, 2);
        Sinon.assert.match(inventory.appliances[0].managementPort, 8443);
        Sinon.assert.match(inventory.appliances[0].interfaces[0].cidrAddress, '10.0.1.31/24');
        Sinon.assert.match(inventory.appliances[1].managementPort, 443);
        Sinon.assert.match(inventory.appliances[1].interfaces.length, 0);
        Sinon.assert.match(inventory.parameters[1].name, 'sshport');
        Sinon.assert.match(inventory.parameters[1].value, '22');
        Sinon.assert.match(inventory.settings['request-timeout'], '10000');
    });
    it('reads parameters given as an object in key order', () => {
        const inventory = parseInventory(
            { appliances: [], parameters: { ntphost: '10.0.1.1', tzone: 'UTC', ha: false } },
            8443
        );
        Sinon.assert.match(
            inventory.parameters.map(p => `${p.name}=${p.value}`).join(','),
            'ntphost=10.0.1.1,tzone=UTC,ha=false'
        );
    });
    it('uses the given default port', () => {
        const inventory = parseInventory(
            { appliances: [{ hostname: 'KEMP1', address: '10.0.1.109' }] },
            8443
        );
        Sinon.assert.match(inventory.appliances[0].managementPort, 8443);
    });
    it('rejects hostname in the parameter list', () => {
        expectValidationError(() =>
            parseInventory({ appliances: [], parameters: [{ name: 'hostname', value: 'x' }] })
        );
    });
    it('rejects structural errors', () => {
        expectValidationError(() => parseInventory([]), 'Inventory must be a JSON object.');
        expectValidationError(
            () => parseInventory({}),
            'Inventory must contain an appliances array.'
        );
        expectValidationError(
            () => parseInventory({ appliances: [{ hostname: 'KEMP1' }] }),
            'appliances[0]: address must be a string.'
        );
        expectValidationError(() =>
            parseInventory({
                appliances: [
                    { hostname: 'KEMP1', address: '10.0.1.109', interfaces: [{ interfaceId: 0 }] }
                ]
            })
        );
        expectValidationError(() => parseInventory({ appliances: [], parameters: 'ntphost' }));
        expectValidationError(() =>
            parseInventory({ appliances: [], parameters: [{ name: '', value: 'x' }] })
        );
    });
    it('leaves the semantic checks of an appliance to the bootstrap', () => {
        const inventory = parseInventory({
            appliances: [
                {
                    hostname: 'KEMP1',
                    address: '10.0.1.109',
                    interfaces: [{ interfaceId: 0, cidrAddress: 'not-a-cidr' }]
                }
            ]
        });
        Sinon.assert.match(inventory.appliances[0].interfaces[0].cidrAddress, 'not-a-cidr');
    });
    it('converts setting overrides to strings', () => {
        const overrides = parseSettingOverrides({ 'verify-tls': true, 'request-timeout': 500 });
        Sinon.assert.match(overrides['verify-tls'], 'true');
        Sinon.assert.match(overrides['request-timeout'], '500');
        expectValidationError(() => parseSettingOverrides({ 'verify-tls': [true] }));
    });
    it('reads the example inventory file', () => {
        const document = readInventoryDocument(
            path.resolve(__dirname, '../example/inventory.json')
        );
        const inventory = parseInventory(document);
        Sinon.assert.match(inventory.appliances[0].hostname, 'KEMP1');
        Sinon.assert.match(inventory.appliances[0].address, '10.0.1.109');
    });
    it('rejects a missing file', () => {
        expectValidationError(() =>
            readInventoryDocument(path.resolve(__dirname, 'no-such-inventory.json'))
        );
    });
});
