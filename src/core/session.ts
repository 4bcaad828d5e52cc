import type { ResolvedOptions } from "../config.ts";
import type { GraphWriter } from "../store/interface.ts";
import type { AuditEvent } from "./audit.ts";
import type { AuthzContext } from "./types.ts";

/**
 * One mutating call: its open transaction plus the audit events it produced.
 * Events are delivered only after the transaction commits.
 */
export interface WriteSession {
	writer: GraphWriter;
	ctx: AuthzContext;
	options: ResolvedOptions;
	events: AuditEvent[];
}
