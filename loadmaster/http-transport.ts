import https from 'https';

export interface HttpRequest {
    hostname: string;
    port: number;
    path: string;
    headers: { [name: string]: string };
    /**
     * milliseconds
     */
    timeout: number;
    rejectUnauthorized: boolean;
}

export interface HttpResponse {
    statusCode: number;
    body: string;
}

export interface HttpTransport {
    send(request: HttpRequest): Promise<HttpResponse>;
}

export class HttpsTransport implements HttpTransport {
    send(request: HttpRequest): Promise<HttpResponse> {
        return new Promise((resolve, reject) => {
            const req = https.request(
                {
                    hostname: request.hostname,
                    port: request.port,
                    path: request.path,
                    method: 'GET',
                    headers: request.headers,
                    timeout: request.timeout,
                    rejectUnauthorized: request.rejectUnauthorized
                },
                response => {
                    const chunks: Buffer[] = [];
                    response.on('data', (chunk: Buffer) => {
                        chunks.push(chunk);
                    });
                    response.on('end', () => {
                        resolve({
                            statusCode: response.statusCode || 0,
                            body: Buffer.concat(chunks).toString('utf8')
                        });
                    });
                    response.on('error', reject);
                }
            );
            req.on('timeout', () => {
                req.destroy(new Error(`Request timed out after ${request.timeout} ms.`));
            });
            req.on('error', reject);
            req.end();
        });
    }
}
