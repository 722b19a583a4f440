import type { HttpRequest, HttpResponse, HttpTransport } from '../loadmaster/http-transport';

export type TestHttpHandler = (request: HttpRequest) => HttpResponse | Error;

export const okResponse = (content = '<Success>Command completed ok</Success>'): HttpResponse => ({
    statusCode: 200,
    body:
        '<?xml version="1.0" encoding="ISO-8859-1"?>\n' +
        `<Response stat="200" code="ok">${content}</Response>`
});

export const failResponse = (message: string, statusCode = 422): HttpResponse => ({
    statusCode: statusCode,
    body:
        '<?xml version="1.0" encoding="ISO-8859-1"?>\n' +
        `<Response stat="${statusCode}" code="fail"><Error>${message}</Error></Response>`
});

export const dataResponse = (data: { [name: string]: string }): HttpResponse =>
    okResponse(
        `<Success><Data>${Object.entries(data)
            .map(([name, value]) => `<${name}>${value}</${name}>`)
            .join('')}</Data></Success>`
    );

/**
 * answers every request through a handler and keeps the requests
 */
export class TestHttpTransport implements HttpTransport {
    readonly requests: HttpRequest[] = [];
    constructor(private readonly handler: TestHttpHandler) {}
    send(request: HttpRequest): Promise<HttpResponse> {
        this.requests.push(request);
        const response = this.handler(request);
        return response instanceof Error ? Promise.reject(response) : Promise.resolve(response);
    }
    paths(): string[] {
        return this.requests.map(request => request.path);
    }
}
