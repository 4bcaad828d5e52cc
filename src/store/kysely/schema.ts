import type { Generated, Selectable } from "kysely";

export interface TuplesTable {
	/** bigserial; pg returns int8 as a string */
	id: Generated<string>;
	namespace: string;
	resource_type: string;
	resource_id: string;
	relation: string;
	subject_type: string;
	subject_id: string;
	/**
	 * Empty string when the subject is a plain entity, so the unique key can
	 * include it.
	 */
	subject_relation: string;
	created_at: Generated<Date>;
	expires_at: Date | null;
}

export interface PermissionHierarchyTable {
	id: Generated<string>;
	namespace: string;
	resource_type: string;
	permission: string;
	implies: string;
	created_at: Generated<Date>;
}

export interface DB {
	tuples: TuplesTable;
	permission_hierarchy: PermissionHierarchyTable;
}

export type TupleRow = Selectable<TuplesTable>;
export type HierarchyRow = Selectable<PermissionHierarchyTable>;
