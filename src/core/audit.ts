import type { Logger } from "./logger.ts";
import { resourceOf, subjectOf } from "./refs.ts";
import type {
	AuthzContext,
	EntityRef,
	HierarchyRule,
	SubjectRef,
	Tuple,
} from "./types.ts";

interface AuditEventBase {
	namespace: string;
	actorId: string | null;
	requestId: string | null;
	reason: string | null;
	occurredAt: Date;
}

export type TupleEventType =
	| "tuple_created"
	| "tuple_updated"
	| "tuple_deleted";
export type HierarchyEventType = "hierarchy_created" | "hierarchy_deleted";
export type AuditEventType = TupleEventType | HierarchyEventType;

export type AuditEvent =
	| (AuditEventBase & {
			eventType: TupleEventType;
			resource: EntityRef;
			relation: string;
			subject: SubjectRef;
			expiresAt: Date | null;
	  })
	| (AuditEventBase & {
			eventType: HierarchyEventType;
			resourceType: string;
			permission: string;
			implies: string;
	  });

/** Receives one event per committed change. */
export interface AuditSink {
	record(event: AuditEvent): void | Promise<void>;
}

function base(ctx: AuthzContext, occurredAt: Date): AuditEventBase {
	return {
		namespace: ctx.namespace,
		actorId: ctx.actorId ?? null,
		requestId: ctx.requestId ?? null,
		reason: ctx.reason ?? null,
		occurredAt,
	};
}

export function tupleEvent(
	eventType: TupleEventType,
	ctx: AuthzContext,
	tuple: Tuple,
	occurredAt: Date,
): AuditEvent {
	return {
		...base(ctx, occurredAt),
		eventType,
		resource: resourceOf(tuple),
		relation: tuple.relation,
		subject: subjectOf(tuple),
		expiresAt: tuple.expiresAt,
	};
}

export function hierarchyEvent(
	eventType: HierarchyEventType,
	ctx: AuthzContext,
	rule: HierarchyRule,
	occurredAt: Date,
): AuditEvent {
	return {
		...base(ctx, occurredAt),
		eventType,
		resourceType: rule.resourceType,
		permission: rule.permission,
		implies: rule.implies,
	};
}

/**
 * Delivers events to every sink after the change committed. A failing sink
 * is reported through the logger; the committed change stands.
 */
export async function emitAudit(
	sinks: readonly AuditSink[],
	events: readonly AuditEvent[],
	logger: Logger,
): Promise<void> {
	for (const event of events) {
		for (const sink of sinks) {
			try {
				await sink.record(event);
			} catch (error) {
				logger.error("audit sink rejected event", {
					eventType: event.eventType,
					namespace: event.namespace,
					error: error instanceof Error ? error.message : String(error),
				});
			}
		}
	}
}

// ── Segmented log ──────────────────────────────────────────────────

function monthIndex(date: Date): number {
	return date.getUTCFullYear() * 12 + date.getUTCMonth();
}

function segmentName(index: number): string {
	const year = Math.floor(index / 12);
	const month = (index % 12) + 1;
	return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}`;
}

function segmentIndex(name: string): number {
	const [year, month] = name.split("-").map(Number);
	return (year ?? 0) * 12 + (month ?? 1) - 1;
}

export interface AuditQuery {
	from?: Date;
	to?: Date;
	namespace?: string;
	eventType?: AuditEventType;
}

/**
 * In-memory audit log split into monthly segments (`YYYY-MM`, UTC).
 * Segments are created ahead of time or on first write and dropped as a
 * whole once they fall out of the retention window.
 */
export class SegmentedAuditLog implements AuditSink {
	private readonly segments = new Map<string, AuditEvent[]>();

	constructor(private readonly clock: () => Date = () => new Date()) {}

	record(event: AuditEvent): void {
		const name = segmentName(monthIndex(event.occurredAt));
		const segment = this.segments.get(name);
		if (segment) {
			segment.push(event);
		} else {
			this.segments.set(name, [event]);
		}
	}

	/**
	 * Creates the current month's segment and `monthsAhead` after it; returns
	 * the names created.
	 */
	ensureSegments(monthsAhead = 3): string[] {
		const created: string[] = [];
		const current = monthIndex(this.clock());
		for (let index = current; index <= current + monthsAhead; index++) {
			const name = segmentName(index);
			if (this.segments.has(name)) continue;
			this.segments.set(name, []);
			created.push(name);
		}
		return created;
	}

	/** Drops segments that ended before the retention cutoff; returns them. */
	dropSegments(olderThanMonths = 84): string[] {
		const cutoff = monthIndex(this.clock()) - olderThanMonths;
		const dropped: string[] = [];
		for (const name of this.segmentNames()) {
			if (segmentIndex(name) + 1 <= cutoff) {
				this.segments.delete(name);
				dropped.push(name);
			}
		}
		return dropped;
	}

	segmentNames(): string[] {
		return [...this.segments.keys()].sort();
	}

	query(query: AuditQuery = {}): AuditEvent[] {
		const events: AuditEvent[] = [];
		for (const name of this.segmentNames()) {
			for (const event of this.segments.get(name) ?? []) {
				const at = event.occurredAt.getTime();
				if (query.from && at < query.from.getTime()) continue;
				if (query.to && at >= query.to.getTime()) continue;
				if (query.namespace && event.namespace !== query.namespace) continue;
				if (query.eventType && event.eventType !== query.eventType) continue;
				events.push(event);
			}
		}
		return events;
	}
}
