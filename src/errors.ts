/**
 * Error kinds surfaced by the bot service.
 *
 * Client errors (invalid input, unknown bot, bad credentials) and a service
 * that is shutting down map onto HTTP statuses. The rest never reach an HTTP response: they are absorbed by retry
 * policies or reported through the bot_status webhook.
 */

export type ErrorKind =
    | 'InvalidRequest'
    | 'Unauthorized'
    | 'NotFound'
    | 'ServiceUnavailable'
    | 'JoinFailure'
    | 'StreamFailure'
    | 'BackendUnavailable'
    | 'DeliveryFailure'
    | 'InternalFault';

export class BotServiceError extends Error {
    readonly kind: ErrorKind;
    readonly status: number;
    readonly detail?: unknown;

    constructor(kind: ErrorKind, message: string, status = 500, detail?: unknown) {
        super(message);
        this.name = `${kind}Error`;
        this.kind = kind;
        this.status = status;
        this.detail = detail;
    }
}

export class InvalidRequestError extends BotServiceError {
    constructor(message: string, detail?: unknown) {
        super('InvalidRequest', message, 400, detail);
    }
}

export class UnauthorizedError extends BotServiceError {
    constructor(message: string) {
        super('Unauthorized', message, 401);
    }
}

export class NotFoundError extends BotServiceError {
    constructor(botId: string) {
        super('NotFound', `Bot ${botId} not found`, 404);
    }
}

export class ServiceUnavailableError extends BotServiceError {
    constructor(message: string) {
        super('ServiceUnavailable', message, 503);
    }
}

export class JoinFailureError extends BotServiceError {
    constructor(reason: string) {
        super('JoinFailure', reason);
    }
}

export class StreamFailureError extends BotServiceError {
    /** BackendUnavailable when the first handshake failed, StreamFailure after reconnects ran out */
    constructor(message: string, kind: 'StreamFailure' | 'BackendUnavailable' = 'StreamFailure') {
        super(kind, message);
    }
}

export class DeliveryFailureError extends BotServiceError {
    readonly retryable: boolean;
    readonly httpStatus: number | null;

    constructor(message: string, retryable: boolean, httpStatus: number | null = null) {
        super('DeliveryFailure', message);
        this.retryable = retryable;
        this.httpStatus = httpStatus;
    }
}

export class InternalFaultError extends BotServiceError {
    constructor(message: string) {
        super('InternalFault', message);
    }
}
