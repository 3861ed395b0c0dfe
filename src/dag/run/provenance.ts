/**
 * @file Provenance Sink
 *
 * Receives one entry per stage call in the execution phase (stage
 * identity, record, parameter dump, outcome, timestamp). A sink is a
 * pure recipient; nothing it does feeds back into planning.
 *
 * @module dag/run
 */

import { EventEmitter } from 'events';
import type { ParamsDump } from '../fingerprint/types.js';
import type { StageIdentity } from '../graph/types.js';
import type { StageOutcome } from '../stage/types.js';

export interface ProvenanceEntry {
    identity: StageIdentity;
    record_id: number;
    record_name: string;
    params_hash: string;
    params: ParamsDump;
    outcome: StageOutcome;
    timestamp: string;
}

export interface ProvenanceSink {
    provenance_record(entry: ProvenanceEntry): void;
}

export type ProvenanceObserver = (entry: ProvenanceEntry) => void;

const CHANNEL = 'provenance' as const;

/**
 * Typed facade over Node.js EventEmitter that fans entries out to
 * subscribers.
 */
export class ProvenanceBus implements ProvenanceSink {
    private readonly emitter: EventEmitter;

    constructor() {
        this.emitter = new EventEmitter();
        this.emitter.setMaxListeners(0);
    }

    /**
     * @returns Unsubscribe function.
     */
    subscribe(observer: ProvenanceObserver): () => void {
        this.emitter.on(CHANNEL, observer);
        return () => this.emitter.off(CHANNEL, observer);
    }

    provenance_record(entry: ProvenanceEntry): void {
        this.emitter.emit(CHANNEL, entry);
    }
}

/** Keeps every entry in memory. */
export class MemoryProvenance implements ProvenanceSink {
    readonly entries: ProvenanceEntry[] = [];

    provenance_record(entry: ProvenanceEntry): void {
        this.entries.push(entry);
    }
}
