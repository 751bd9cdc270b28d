import type { RandomSource } from "@tether/backoff"
import type { Clock } from "@tether/clock"
import { type CallHandle, transform } from "@tether/future"
import type { Logger } from "@tether/logger"
import {
  resolveRetryOptions,
  type RetryOptions,
  RetryingUnaryOperation,
  type UnaryTransport,
} from "@tether/retry"
import type {
  CreateTableFromSnapshotRequestMessage,
  DeleteSnapshotRequestMessage,
  GetSnapshotRequestMessage,
  ListSnapshotsRequestMessage,
  ListSnapshotsResponseMessage,
  OperationMessage,
  SnapshotMessage,
  SnapshotTableRequestMessage,
} from "../ports/messages"
import type { CreateTableInput, ModifyFamiliesInput, Table } from "../ports/models"
import type { TableAdminRpc } from "../ports/table-admin-rpc"
import type { InstanceName } from "./instance-name"
import {
  toCreateTableRequest,
  toDropRowRangeRequest,
  toModifyColumnFamiliesRequest,
  toTable,
} from "./mappers"

export type TableAdminClientDeps = {
  rpc: TableAdminRpc
  instance: InstanceName
  clock: Clock
  /** Retry policy shared by every method, merged over the defaults */
  options?: Partial<RetryOptions>
  logger?: Logger
  random?: RandomSource
}

const toVoid = (): void => undefined

/**
 * Table administration for one instance.
 *
 * Translates short table ids to fully qualified names and back, and runs
 * each method as one retrying unary call.
 */
export class TableAdminClient {
  readonly instance: InstanceName
  private readonly options: RetryOptions

  constructor(private readonly deps: TableAdminClientDeps) {
    this.instance = deps.instance
    this.options = resolveRetryOptions(deps.options)
  }

  createTable(input: CreateTableInput): CallHandle<Table> {
    const request = toCreateTableRequest(this.instance, input)

    return transform(this.call("createTable", this.deps.rpc.createTable, request), (table) =>
      toTable(this.instance, table),
    )
  }

  getTable(tableId: string): CallHandle<Table> {
    const request = { name: this.instance.toTableName(tableId) }

    return transform(this.call("getTable", this.deps.rpc.getTable, request), (table) =>
      toTable(this.instance, table),
    )
  }

  /** Ids of every table in the instance. */
  listTables(): CallHandle<string[]> {
    const request = { parent: this.instance.toString() }

    return transform(this.call("listTables", this.deps.rpc.listTables, request), (response) =>
      response.tables.map((table) => this.instance.toTableId(table.name)),
    )
  }

  deleteTable(tableId: string): CallHandle<void> {
    const request = { name: this.instance.toTableName(tableId) }

    return transform(this.call("deleteTable", this.deps.rpc.deleteTable, request), toVoid)
  }

  modifyFamilies(input: ModifyFamiliesInput): CallHandle<Table> {
    const request = toModifyColumnFamiliesRequest(this.instance, input)

    return transform(
      this.call("modifyFamilies", this.deps.rpc.modifyColumnFamilies, request),
      (table) => toTable(this.instance, table),
    )
  }

  /** Drops rows starting with `rowKeyPrefix`, or every row without one. */
  dropRowRange(tableId: string, rowKeyPrefix?: string): CallHandle<void> {
    const request = toDropRowRangeRequest(this.instance, tableId, rowKeyPrefix)

    return transform(this.call("dropRowRange", this.deps.rpc.dropRowRange, request), toVoid)
  }

  snapshotTable(request: SnapshotTableRequestMessage): CallHandle<OperationMessage> {
    const handle = this.call("snapshotTable", this.deps.rpc.snapshotTable, request)

    return transform(handle, (operation) => operation)
  }

  getSnapshot(request: GetSnapshotRequestMessage): CallHandle<SnapshotMessage> {
    const handle = this.call("getSnapshot", this.deps.rpc.getSnapshot, request)

    return transform(handle, (snapshot) => snapshot)
  }

  listSnapshots(request: ListSnapshotsRequestMessage): CallHandle<ListSnapshotsResponseMessage> {
    const handle = this.call("listSnapshots", this.deps.rpc.listSnapshots, request)

    return transform(handle, (response) => response)
  }

  deleteSnapshot(request: DeleteSnapshotRequestMessage): CallHandle<void> {
    return transform(this.call("deleteSnapshot", this.deps.rpc.deleteSnapshot, request), toVoid)
  }

  createTableFromSnapshot(
    request: CreateTableFromSnapshotRequestMessage,
  ): CallHandle<OperationMessage> {
    return transform(
      this.call("createTableFromSnapshot", this.deps.rpc.createTableFromSnapshot, request),
      (operation) => operation,
    )
  }

  private call<Req, Res>(
    name: string,
    transport: UnaryTransport<Req, Res>,
    request: Req,
  ): CallHandle<Res> {
    const { clock, logger, random } = this.deps
    const operation = new RetryingUnaryOperation(
      { name, request, transport, options: this.options },
      { clock, ...(logger && { logger }), ...(random && { random }) },
    )

    return operation.start()
  }
}
