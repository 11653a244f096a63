/**
 * Locked outcome codes for a balancer send.
 */
export const SendStatus = {
    /** Item passed admission and reached the sink */
    ACCEPTED: "ACCEPTED",
    /** Item failed admission; redundant, stale or out of sequence */
    REJECTED: "REJECTED",
    /** Downstream consumer no longer exists */
    SINK_GONE: "SINK_GONE",
} as const;

/**
 * Locked reason codes for a REJECTED send.
 */
export const RejectReasons = {
    /** Sequence id not greater than the last accepted id */
    DUPLICATE_OR_STALE: "DUPLICATE_OR_STALE",
    /** Depth update ends at or before the bootstrap snapshot */
    BEHIND_SNAPSHOT: "BEHIND_SNAPSHOT",
    /** Depth update starts at or before the last merged update */
    STALE_UPDATE: "STALE_UPDATE",
    /** Depth update starts after the next expected id */
    SEQUENCE_GAP: "SEQUENCE_GAP",
} as const;

export type RejectReason = (typeof RejectReasons)[keyof typeof RejectReasons];
