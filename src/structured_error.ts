/**
 * Structured errors for the monitor.
 *
 * Two shapes:
 * - MonitorError: thrown by the client, the store and the config loader.
 * - StructuredError: a machine-readable record of a non-fatal problem found
 *   during a cycle. Logged and collected in the cycle report; never thrown.
 */

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export const ERRORS = {
    INVALID_CONFIG: 'INVALID_CONFIG',
    FETCH_FAILED: 'FETCH_FAILED',
    FETCH_EXHAUSTED: 'FETCH_EXHAUSTED',
    MALFORMED_SNAPSHOT: 'MALFORMED_SNAPSHOT',
    AMBIGUOUS_RECONCILIATION: 'AMBIGUOUS_RECONCILIATION',
    UNMATCHED_DISK_DROP: 'UNMATCHED_DISK_DROP',
    INVARIANT_VIOLATION: 'INVARIANT_VIOLATION',
    STORE_FAILURE: 'STORE_FAILURE',
    CORRUPT_REGISTRY: 'CORRUPT_REGISTRY',
    DELIVERY_FAILED: 'DELIVERY_FAILED',
    LOCK_HELD: 'LOCK_HELD',
    MACHINE_FAILED: 'MACHINE_FAILED',
} as const;

export type ErrorCode = (typeof ERRORS)[keyof typeof ERRORS];

export type Severity = 'FATAL' | 'ERROR' | 'WARNING';

export type RecoveryAction =
    | 'retry_next_cycle'
    | 'skip_machine'
    | 'default_to_end'
    | 'keep_stored'
    | 'retry_delivery'
    | 'fix_config'
    | 'escalate_to_operator';

export interface StructuredError {
    code: ErrorCode;
    message: string;
    severity: Severity;
    context: Record<string, unknown>;
    recovery: RecoveryAction;
    timestamp: string;
}

export class MonitorError extends Error {
    constructor(message: string, public readonly code: ErrorCode, public readonly cause?: unknown) {
        super(message);
        this.name = 'MonitorError';
    }
}

/* -------------------------------------------------------------------------- */
/* Error Builders                                                             */
/* -------------------------------------------------------------------------- */

export function createStructuredError(
    code: ErrorCode,
    message: string,
    recovery: RecoveryAction,
    context: Record<string, unknown> = {}
): StructuredError {
    return {
        code,
        message,
        severity: getSeverity(code),
        context,
        recovery,
        timestamp: new Date().toISOString(),
    };
}

function getSeverity(code: ErrorCode): Severity {
    const fatalCodes: ErrorCode[] = [
        'INVALID_CONFIG',
        'STORE_FAILURE',
        'LOCK_HELD',
    ];

    const warningCodes: ErrorCode[] = [
        'AMBIGUOUS_RECONCILIATION',
        'UNMATCHED_DISK_DROP',
        'DELIVERY_FAILED',
    ];

    if (fatalCodes.includes(code)) return 'FATAL';
    if (warningCodes.includes(code)) return 'WARNING';
    return 'ERROR';
}

/** Flatten for logger payloads. */
export function toLogData(err: StructuredError): Record<string, unknown> {
    return { code: err.code, severity: err.severity, recovery: err.recovery, ...err.context };
}

/* -------------------------------------------------------------------------- */
/* Error Factory Methods                                                      */
/* -------------------------------------------------------------------------- */

export class ErrorFactory {
    static fetchExhausted(attempts: number, lastError: string): StructuredError {
        return createStructuredError(
            'FETCH_EXHAUSTED',
            `Machine list fetch failed after ${attempts} attempts`,
            'retry_next_cycle',
            { attempts, last_error: lastError }
        );
    }

    static malformedSnapshot(machineId: number | null, problems: string[]): StructuredError {
        return createStructuredError(
            'MALFORMED_SNAPSHOT',
            `Snapshot for machine ${machineId ?? '?'} is malformed; skipping this cycle`,
            'skip_machine',
            { machine_id: machineId, problems }
        );
    }

    static ambiguousReconciliation(
        machineId: number,
        sessionId: string,
        diskDelta: number,
        storageGb: number
    ): StructuredError {
        return createStructuredError(
            'AMBIGUOUS_RECONCILIATION',
            `Ambiguous disk change ${diskDelta.toFixed(2)} GB for session ${sessionId}; treating as ended`,
            'default_to_end',
            { machine_id: machineId, session_id: sessionId, disk_delta_gb: diskDelta, storage_gb: storageGb }
        );
    }

    static unmatchedDiskDrop(machineId: number, dropGb: number, closestDiffGb: number | null): StructuredError {
        return createStructuredError(
            'UNMATCHED_DISK_DROP',
            `Disk-only drop ${dropGb.toFixed(2)} GB did not match a stored session within tolerance`,
            'keep_stored',
            { machine_id: machineId, drop_gb: dropGb, closest_diff_gb: closestDiffGb }
        );
    }

    static invariantViolation(machineId: number, violations: string[]): StructuredError {
        return createStructuredError(
            'INVARIANT_VIOLATION',
            `Registry for machine ${machineId} violates ${violations.length} invariant(s)`,
            'escalate_to_operator',
            { machine_id: machineId, violations }
        );
    }

    static deliveryFailed(target: string, eventType: string, attempts: number, lastError: string): StructuredError {
        return createStructuredError(
            'DELIVERY_FAILED',
            `Notification ${eventType} to ${target} failed after ${attempts} attempts`,
            'retry_delivery',
            { target, event_type: eventType, attempts, last_error: lastError }
        );
    }

    static machineFailed(machineId: number, error: string): StructuredError {
        return createStructuredError(
            'MACHINE_FAILED',
            `Processing machine ${machineId} failed; registry left as last committed`,
            'retry_next_cycle',
            { machine_id: machineId, error }
        );
    }
}
