import { parseStringPromise as xml2jsParserPromise } from 'xml2js';
import { isRecord } from '../helper-function';

/**
 * An answer of the LoadMaster /access API, e.g.
 *   <Response stat="200" code="ok"><Success><Data>...</Data></Success></Response>
 *   <Response stat="422" code="fail"><Error>Unknown parameter</Error></Response>
 */
export interface LoadMasterResponse {
    status: number;
    code: string;
    success: boolean;
    /**
     * children of the Data element, empty if there is none
     */
    data: { [key: string]: unknown };
    /**
     * the text of the Success or Error element
     */
    message: string;
}

/**
 * the text content of an element converted by xml2js, whether it carries attributes or not
 * @param {unknown} node converted element
 * @returns {string | undefined} text content
 */
export function readText(node: unknown): string | undefined {
    if (typeof node === 'string') {
        return node;
    }
    if (isRecord(node) && typeof node._ === 'string') {
        return node._;
    }
    return undefined;
}

export async function parseLoadMasterResponse(xml: string): Promise<LoadMasterResponse> {
    const document: unknown = await xml2jsParserPromise(xml, {
        explicitArray: false,
        trim: true
    });
    if (!isRecord(document) || !isRecord(document.Response)) {
        throw new Error('Response element not found.');
    }
    const response = document.Response;
    const attributes = isRecord(response.$) ? response.$ : {};
    const code = typeof attributes.code === 'string' ? attributes.code : '';
    const status = Number(attributes.stat);
    const success = code.toLowerCase() === 'ok' && response.Error === undefined;
    let data: { [key: string]: unknown } = {};
    let message = '';
    if (success) {
        const content = response.Success;
        if (isRecord(content) && isRecord(content.Data)) {
            data = content.Data;
        }
        message = readText(content) || '';
    } else {
        message = readText(response.Error) || `code: ${code || '(none)'}`;
    }
    return {
        status: isNaN(status) ? 0 : status,
        code: code,
        success: success,
        data: data,
        message: message
    };
}
