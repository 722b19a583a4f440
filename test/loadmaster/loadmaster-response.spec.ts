import { describe, it } from 'mocha';
import Sinon from 'sinon';

import { parseLoadMasterResponse, readText } from '../../loadmaster/loadmaster-response';

describe('LoadMaster response', () => {
    it('reads the data of a successful answer', async () => {
        const response = await parseLoadMasterResponse(
            '<?xml version="1.0" encoding="ISO-8859-1"?>\n' +
                '<Response stat="200" code="ok"><Success><Data>' +
                '<LicenseType>Permanent</LicenseType><UUID>test-uuid</UUID>' +
                '</Data></Success></Response>'
        );
        Sinon.assert.match(response.success, true);
        Sinon.assert.match(response.status, 200);
        Sinon.assert.match(response.code, 'ok');
        Sinon.assert.match(readText(response.data.LicenseType), 'Permanent');
        Sinon.assert.match(readText(response.data.UUID), 'test-uuid');
    });
    it('reads the message of a successful answer without data', async () => {
        const response = await parseLoadMasterResponse(
            '<Response stat="200" code="ok"><Success>Command completed ok</Success></Response>'
        );
        Sinon.assert.match(response.success, true);
        Sinon.assert.match(response.message, 'Command completed ok');
        Sinon.assert.match(Object.keys(response.data).length, 0);
    });
    it('reads the error of a refused command', async () => {
        const response = await parseLoadMasterResponse(
            '<Response stat="422" code="fail"><Error>Unknown parameter value</Error></Response>'
        );
        Sinon.assert.match(response.success, false);
        Sinon.assert.match(response.status, 422);
        Sinon.assert.match(response.message, 'Unknown parameter value');
    });
    it('describes a refusal without an error text by its code', async () => {
        const response = await parseLoadMasterResponse('<Response stat="401" code="fail"/>');
        Sinon.assert.match(response.success, false);
        Sinon.assert.match(response.message, 'code: fail');
    });
    it('rejects a document without a Response element', async () => {
        try {
            await parseLoadMasterResponse('<html><body>Not found</body></html>');
            Sinon.assert.fail('should throw.');
        } catch (error) {
            Sinon.assert.match(
                error instanceof Error && error.message,
                'Response element not found.'
            );
        }
    });
    it('reads the text of an element with attributes', () => {
        Sinon.assert.match(readText({ _: 'text', $: { lang: 'en' } }), 'text');
        Sinon.assert.match(readText('text'), 'text');
        Sinon.assert.match(readText({ child: 'text' }) === undefined, true);
    });
});
