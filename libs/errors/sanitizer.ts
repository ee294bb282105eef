import { logger } from '../logging/logger.js';
import { MaskError } from '../mask/errors.js';
import crypto from 'crypto';

/**
 * Response-side error wrapper.
 * A failed masking call must never leak the unmasked body or the member that failed,
 * so callers only see a generic message and an IncidentID for log correlation.
 */

export class MaskFailure extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly statusCode: number;
    public readonly code?: string;
    public readonly contextLabel?: string;
    public override cause?: unknown;

    constructor(
        public readonly publicMessage: string,
        public readonly internalDetails?: unknown,
        options?: { cause?: unknown; contextLabel?: string; code?: string; statusCode?: number; incidentId?: string }
    ) {
        super(publicMessage);
        this.name = 'MaskFailure';
        this.incidentId = options?.incidentId ?? crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.statusCode = options?.statusCode ?? 500;
        this.code = options?.code;
        this.contextLabel = options?.contextLabel;
        this.cause = options?.cause;

        // Log the full internal details with the IncidentID
        logger.error({
            incidentId: this.incidentId,
            code: this.code,
            internalDetails,
            stack: this.stack
        }, publicMessage);
    }
}

export const ErrorSanitizer = {
    /**
     * Wraps any error raised while shaping a response into a MaskFailure.
     */
    sanitize: (err: unknown, contextLabel: string): MaskFailure => {
        if (err instanceof MaskFailure) return err;

        if (err instanceof MaskError) {
            const incidentId = crypto.randomUUID();
            return new MaskFailure(
                `The response could not be prepared. Please contact support with ID: ${incidentId}`,
                { originalError: err.message, path: err.path, context: contextLabel },
                { cause: err, contextLabel, code: err.code, statusCode: err.statusCode, incidentId }
            );
        }

        let originalErrorMessage: string;
        let originalErrorStack: string | undefined;

        if (err instanceof Error) {
            originalErrorMessage = err.message;
            originalErrorStack = err.stack;
        } else if (typeof err === 'string') {
            originalErrorMessage = err;
        } else {
            originalErrorMessage = String(err);
        }

        return new MaskFailure(
            `An internal system error occurred. Please contact support with ID: ${contextLabel}`,
            { originalError: originalErrorMessage, stack: originalErrorStack, context: contextLabel },
            { cause: err, contextLabel }
        );
    }
};
