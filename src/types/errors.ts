/**
 * @packageDocumentation
 * @module NVPErrors
 * @description
 * Error raised when the gateway itself declares a call failed.
 *
 * Transport failures (connection refused, reset sockets, body read errors) are
 * not wrapped: they reach the caller exactly as the HTTP client raised them.
 * Only replies whose ACK reports a failure, or that carry an error code, are
 * turned into an `NVPError`.
 */
import type { NVPValues } from './nvp';
import type { NVPResponse } from '../nvp/NVPResponse';
import { getValue } from '../nvp/codec';

export const MAINTENANCE_MESSAGE = 'PayPal is undergoing maintenance.\nPlease try again later.';

export class NVPError extends Error {
    public ack: string;
    public errorCode: string;
    public shortMessage: string;
    public longMessage: string;
    public severityCode: string;
    /** Reply fields that were decoded before the failure was detected */
    public response?: NVPResponse;

    constructor(
        fields: {
            ack?: string;
            errorCode?: string;
            shortMessage?: string;
            longMessage?: string;
            severityCode?: string;
        },
        response?: NVPResponse
    ) {
        const ack = fields.ack ?? '';
        const errorCode = fields.errorCode ?? '';
        const shortMessage = fields.shortMessage ?? '';

        super(NVPError.describe(ack, errorCode, shortMessage));
        this.name = 'NVPError';
        this.ack = ack;
        this.errorCode = errorCode;
        this.shortMessage = shortMessage;
        this.longMessage = fields.longMessage ?? '';
        this.severityCode = fields.severityCode ?? '';
        this.response = response;

        Object.setPrototypeOf(this, NVPError.prototype);
    }

    /**
     * Build the error from the first error entry (`L_*0`) of a reply.
     */
    static fromValues(values: NVPValues, response?: NVPResponse): NVPError {
        return new NVPError(
            {
                ack: getValue(values, 'ACK'),
                errorCode: getValue(values, 'L_ERRORCODE0'),
                shortMessage: getValue(values, 'L_SHORTMESSAGE0'),
                longMessage: getValue(values, 'L_LONGMESSAGE0'),
                severityCode: getValue(values, 'L_SEVERITYCODE0'),
            },
            response
        );
    }

    private static describe(ack: string, errorCode: string, shortMessage: string): string {
        if (errorCode && shortMessage) {
            return `PayPal Error ${errorCode}: ${shortMessage}`;
        }
        if (ack) {
            return ack;
        }
        return MAINTENANCE_MESSAGE;
    }

    toJSON() {
        return {
            name: this.name,
            message: this.message,
            ack: this.ack,
            errorCode: this.errorCode,
            shortMessage: this.shortMessage,
            longMessage: this.longMessage,
            severityCode: this.severityCode,
            correlationId: this.response?.correlationId,
        };
    }
}

export function isNVPError(value: unknown): value is NVPError {
    return value instanceof NVPError;
}
