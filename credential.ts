export interface Credential {
    readonly principal: string;
    readonly secret: string;
}

export function createCredential(principal: string, secret: string): Credential {
    return Object.freeze({ principal: principal, secret: secret });
}

/**
 * Holds the one credential that is current for an appliance. A credential is never changed in
 * place: rotate() replaces it with a new value.
 */
export class CredentialManager {
    private _current: Credential;
    constructor(initial: Credential) {
        this._current = initial;
    }

    get current(): Credential {
        return this._current;
    }

    rotate(principal: string, secret: string): Credential {
        this._current = createCredential(principal, secret);
        return this._current;
    }

    // keep the secret out of logs and JSON output
    toJSON(): { principal: string } {
        return { principal: this._current.principal };
    }
}
