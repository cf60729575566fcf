/**
 * @file    ledger.ts
 * @purpose Append-only, ordered record of every pipeline decision for one claim run.
 *
 * Events are frozen on append and never reordered, merged or removed.
 * snapshot() copies the current prefix, so callers may read while the
 * pipeline keeps appending.
 */

import { randomUUID } from "node:crypto";
import { AuditLedgerError, describeError } from "../errors";
import type { AuditEvent, AuditOutcome, AuditSubject, ClaimStage } from "../../types/claims";

export interface AuditEventInput {
    stage: ClaimStage;
    subject: AuditSubject;
    outcome: AuditOutcome;
    detail: string;
    metadata?: Record<string, unknown>;
}

/** Destination that receives every event after it is appended (e.g. a store shared by many claims). */
export interface AuditSink {
    append(event: AuditEvent): void;
}

export interface AuditLedgerOptions {
    maxEvents?: number;
    sinks?: AuditSink[];
    clock?: () => Date;
    idFactory?: () => string;
}

export class AuditLedger {
    private readonly events: AuditEvent[] = [];
    private readonly maxEvents: number;
    private readonly sinks: AuditSink[];
    private readonly clock: () => Date;
    private readonly idFactory: () => string;

    constructor(readonly claimId: string, options: AuditLedgerOptions = {}) {
        this.maxEvents = options.maxEvents ?? 10_000;
        this.sinks = options.sinks ?? [];
        this.clock = options.clock ?? (() => new Date());
        this.idFactory = options.idFactory ?? randomUUID;
    }

    get size(): number {
        return this.events.length;
    }

    /** Append one event. Throws AuditLedgerError only when the ledger or a sink cannot take it. */
    record(input: AuditEventInput): AuditEvent {
        if (this.events.length >= this.maxEvents) {
            throw new AuditLedgerError(`Audit ledger for claim ${this.claimId} is full (${this.maxEvents} events)`);
        }

        const event: AuditEvent = Object.freeze({
            sequence: this.events.length + 1,
            eventId: this.idFactory(),
            timestamp: this.clock().toISOString(),
            claimId: this.claimId,
            stage: input.stage,
            subject: Object.freeze({ ...input.subject }),
            outcome: input.outcome,
            detail: input.detail,
            ...(input.metadata ? { metadata: Object.freeze({ ...input.metadata }) } : {}),
        });
        this.events.push(event);

        for (const sink of this.sinks) {
            try {
                sink.append(event);
            } catch (err) {
                throw new AuditLedgerError(`Audit sink rejected event ${event.sequence}: ${describeError(err).message}`);
            }
        }
        return event;
    }

    snapshot(): readonly AuditEvent[] {
        return Object.freeze(this.events.slice());
    }
}

/** In-memory sink that several claim runs can share. */
export class MemoryAuditSink implements AuditSink {
    private readonly events: AuditEvent[] = [];

    append(event: AuditEvent): void {
        this.events.push(event);
    }

    eventsFor(claimId: string): AuditEvent[] {
        return this.events.filter(e => e.claimId === claimId);
    }

    get size(): number {
        return this.events.length;
    }
}
