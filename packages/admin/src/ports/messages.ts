/**
 * Wire shapes of the table admin API as the transport carries them.
 * Resource names are fully qualified, e.g.
 * `projects/my-project/instances/my-instance/tables/users`.
 */

export type GcRuleMessage =
  | { maxNumVersions: number }
  | { maxAgeMs: number }
  | { intersection: { rules: GcRuleMessage[] } }
  | { union: { rules: GcRuleMessage[] } }

export type ColumnFamilyMessage = {
  gcRule?: GcRuleMessage
}

export type TableMessage = {
  name: string
  columnFamilies?: Record<string, ColumnFamilyMessage>
}

export type Empty = Record<string, never>

export type CreateTableRequestMessage = {
  parent: string
  tableId: string
  table: { columnFamilies: Record<string, ColumnFamilyMessage> }
  /** Row keys at which to pre-split the table */
  initialSplits?: { key: Uint8Array }[]
}

export type GetTableRequestMessage = { name: string }

export type ListTablesRequestMessage = { parent: string; pageToken?: string }

export type ListTablesResponseMessage = {
  tables: TableMessage[]
  nextPageToken?: string
}

export type DeleteTableRequestMessage = { name: string }

export type ModificationMessage =
  | { id: string; create: ColumnFamilyMessage }
  | { id: string; update: ColumnFamilyMessage }
  | { id: string; drop: true }

export type ModifyColumnFamiliesRequestMessage = {
  name: string
  modifications: ModificationMessage[]
}

export type DropRowRangeRequestMessage =
  | { name: string; deleteAllDataFromTable: true }
  | { name: string; deleteAllDataFromTable: false; rowKeyPrefix: Uint8Array }

/** Handle on a long-running server-side operation. */
export type OperationMessage = {
  name: string
  done: boolean
}

export type SnapshotTableRequestMessage = {
  /** Table to snapshot */
  name: string
  /** Cluster that takes the snapshot */
  cluster: string
  snapshotId: string
  ttlMs?: number
  description?: string
}

export type SnapshotMessage = {
  name: string
  sourceTable?: TableMessage
  state: "STATE_NOT_KNOWN" | "READY" | "CREATING"
  createTime?: string
  deleteTime?: string
  description?: string
}

export type GetSnapshotRequestMessage = { name: string }

export type ListSnapshotsRequestMessage = {
  /** Cluster name; `-` as the cluster id lists every cluster */
  parent: string
  pageSize?: number
  pageToken?: string
}

export type ListSnapshotsResponseMessage = {
  snapshots: SnapshotMessage[]
  nextPageToken?: string
}

export type DeleteSnapshotRequestMessage = { name: string }

export type CreateTableFromSnapshotRequestMessage = {
  parent: string
  tableId: string
  sourceSnapshot: string
}
