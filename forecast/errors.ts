/**
 * Weather Forecast Client — Errors
 *
 * Transport errors are not modelled here: they reach the caller as thrown
 * by the transport.
 */

export class ForecastClientError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ForecastClientError';
    }
}

/**
 * A wire token that maps to no variant of the enumeration being decoded.
 */
export class UnrecognizedTokenError extends ForecastClientError {
    readonly enumName: string;
    readonly token: string;

    constructor(enumName: string, token: string) {
        super(`Unrecognized ${enumName} token: ${JSON.stringify(token)}`);
        this.name = 'UnrecognizedTokenError';
        this.enumName = enumName;
        this.token = token;
    }
}

/**
 * The request URL could not be formed. Not recoverable by retrying.
 */
export class MalformedUrlError extends ForecastClientError {
    readonly url: string;

    constructor(message: string, url: string, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = 'MalformedUrlError';
        this.url = url;
    }
}

export class BuilderConsumedError extends ForecastClientError {
    constructor(builderName: string) {
        super(`${builderName} has already been built`);
        this.name = 'BuilderConsumedError';
    }
}

export class ResponseDecodeError extends ForecastClientError {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(`Response body does not match the forecast schema: ${issues.join('; ')}`);
        this.name = 'ResponseDecodeError';
        this.issues = issues;
    }
}
