import type {
  ColumnFamilyMessage,
  CreateTableRequestMessage,
  DropRowRangeRequestMessage,
  ModificationMessage,
  ModifyColumnFamiliesRequestMessage,
  TableMessage,
} from "../ports/messages"
import type {
  ColumnFamily,
  CreateTableInput,
  FamilyModification,
  GcRule,
  ModifyFamiliesInput,
  Table,
} from "../ports/models"
import type { InstanceName } from "./instance-name"

const utf8 = new TextEncoder()

function toFamilyMessage(gcRule: GcRule | undefined): ColumnFamilyMessage {
  return gcRule ? { gcRule } : {}
}

export function toTable(instance: InstanceName, message: TableMessage): Table {
  const columnFamilies: Record<string, ColumnFamily> = {}

  for (const [family, value] of Object.entries(message.columnFamilies ?? {})) {
    columnFamilies[family] = value.gcRule ? { gcRule: value.gcRule } : {}
  }

  return { id: instance.toTableId(message.name), columnFamilies }
}

export function toCreateTableRequest(
  instance: InstanceName,
  input: CreateTableInput,
): CreateTableRequestMessage {
  const columnFamilies: Record<string, ColumnFamilyMessage> = {}

  for (const [family, gcRule] of Object.entries(input.families ?? {})) {
    columnFamilies[family] = toFamilyMessage(gcRule)
  }

  return {
    parent: instance.toString(),
    tableId: input.tableId,
    table: { columnFamilies },
    ...(input.splitKeys && input.splitKeys.length > 0 && {
      initialSplits: input.splitKeys.map((key) => ({ key: utf8.encode(key) })),
    }),
  }
}

function toModificationMessage(modification: FamilyModification): ModificationMessage {
  switch (modification.kind) {
    case "create":
      return { id: modification.family, create: toFamilyMessage(modification.gcRule) }
    case "update":
      return { id: modification.family, update: { gcRule: modification.gcRule } }
    case "drop":
      return { id: modification.family, drop: true }
  }
}

export function toModifyColumnFamiliesRequest(
  instance: InstanceName,
  input: ModifyFamiliesInput,
): ModifyColumnFamiliesRequestMessage {
  return {
    name: instance.toTableName(input.tableId),
    modifications: input.modifications.map(toModificationMessage),
  }
}

/** An empty or absent prefix drops every row. */
export function toDropRowRangeRequest(
  instance: InstanceName,
  tableId: string,
  rowKeyPrefix?: string,
): DropRowRangeRequestMessage {
  const name = instance.toTableName(tableId)

  if (!rowKeyPrefix) {
    return { name, deleteAllDataFromTable: true }
  }

  return { name, deleteAllDataFromTable: false, rowKeyPrefix: utf8.encode(rowKeyPrefix) }
}
