import type { UnaryTransport } from "@tether/retry"
import type {
  CreateTableFromSnapshotRequestMessage,
  CreateTableRequestMessage,
  DeleteSnapshotRequestMessage,
  DeleteTableRequestMessage,
  DropRowRangeRequestMessage,
  Empty,
  GetSnapshotRequestMessage,
  GetTableRequestMessage,
  ListSnapshotsRequestMessage,
  ListSnapshotsResponseMessage,
  ListTablesRequestMessage,
  ListTablesResponseMessage,
  ModifyColumnFamiliesRequestMessage,
  OperationMessage,
  SnapshotMessage,
  SnapshotTableRequestMessage,
  TableMessage,
} from "./messages"

/** One unary transport per admin method. */
export interface TableAdminRpc {
  createTable: UnaryTransport<CreateTableRequestMessage, TableMessage>
  getTable: UnaryTransport<GetTableRequestMessage, TableMessage>
  listTables: UnaryTransport<ListTablesRequestMessage, ListTablesResponseMessage>
  deleteTable: UnaryTransport<DeleteTableRequestMessage, Empty>
  modifyColumnFamilies: UnaryTransport<ModifyColumnFamiliesRequestMessage, TableMessage>
  dropRowRange: UnaryTransport<DropRowRangeRequestMessage, Empty>
  snapshotTable: UnaryTransport<SnapshotTableRequestMessage, OperationMessage>
  getSnapshot: UnaryTransport<GetSnapshotRequestMessage, SnapshotMessage>
  listSnapshots: UnaryTransport<ListSnapshotsRequestMessage, ListSnapshotsResponseMessage>
  deleteSnapshot: UnaryTransport<DeleteSnapshotRequestMessage, Empty>
  createTableFromSnapshot: UnaryTransport<CreateTableFromSnapshotRequestMessage, OperationMessage>
}
