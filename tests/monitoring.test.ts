/**
 * Monitoring Tests
 *
 * Tests for the AuditLogger call record.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { AuditLogger } from '../src/monitoring/AuditLogger';

describe('AuditLogger', () => {
    let logger: AuditLogger;

    beforeEach(() => {
        logger = new AuditLogger();
        vi.useFakeTimers();
        vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    function record(method: string, success = true) {
        return logger.log({
            method,
            environment: 'sandbox',
            ack: success ? 'Success' : 'Failure',
            correlationId: `corr-${method}`,
            success,
        });
    }

    it('should assign an id and timestamp', () => {
        const entry = record('SetExpressCheckout');

        expect(entry.id).toMatch(/^[0-9a-f-]{36}$/);
        expect(entry.timestamp).toBe(new Date('2024-01-01T00:00:00Z').getTime());
    });

    it('should return newest first', () => {
        record('SetExpressCheckout');
        vi.advanceTimersByTime(1000);
        record('GetExpressCheckoutDetails');
        vi.advanceTimersByTime(1000);
        record('DoExpressCheckoutPayment');

        expect(logger.getLogs().map((l) => l.method)).toEqual([
            'DoExpressCheckoutPayment',
            'GetExpressCheckoutDetails',
            'SetExpressCheckout',
        ]);
    });

    it('should keep the latest call first when timestamps are equal', () => {
        record('SetExpressCheckout');
        record('GetExpressCheckoutDetails');

        expect(logger.getLogs()[0].method).toBe('GetExpressCheckoutDetails');
    });

    it('should filter by method, outcome and time', () => {
        const start = Date.now();
        record('SetExpressCheckout');
        vi.advanceTimersByTime(5000);
        record('SetExpressCheckout', false);
        vi.advanceTimersByTime(5000);
        record('GetExpressCheckoutDetails');

        expect(logger.getLogs({ method: 'SetExpressCheckout' })).toHaveLength(2);
        expect(logger.getLogs({ success: false })).toHaveLength(1);
        expect(logger.getLogs({ startTime: start + 1000 })).toHaveLength(2);
        expect(logger.getLogs({ endTime: start + 1000 })).toHaveLength(1);
    });

    it('should paginate', () => {
        for (let i = 0; i < 5; i++) {
            record(`M${i}`);
            vi.advanceTimersByTime(10);
        }

        expect(logger.getLogs({ limit: 2 }).map((l) => l.method)).toEqual(['M4', 'M3']);
        expect(logger.getLogs({ limit: 2, offset: 2 }).map((l) => l.method)).toEqual(['M2', 'M1']);
    });

    it('should clear all records', () => {
        record('SetExpressCheckout');
        logger.clear();

        expect(logger.getLogs()).toEqual([]);
    });
});
