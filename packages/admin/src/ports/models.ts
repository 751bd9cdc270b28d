import type { GcRuleMessage } from "./messages"

/** Garbage collection policy of a column family; same shape on the wire. */
export type GcRule = GcRuleMessage

export type ColumnFamily = {
  gcRule?: GcRule
}

export type Table = {
  /** Short id, without the instance prefix */
  id: string
  columnFamilies: Record<string, ColumnFamily>
}

export type CreateTableInput = {
  tableId: string
  /** Family name to its GC rule; `undefined` keeps every version */
  families?: Record<string, GcRule | undefined>
  splitKeys?: string[]
}

export type FamilyModification =
  | { kind: "create"; family: string; gcRule?: GcRule }
  | { kind: "update"; family: string; gcRule: GcRule }
  | { kind: "drop"; family: string }

export type ModifyFamiliesInput = {
  tableId: string
  modifications: FamilyModification[]
}
