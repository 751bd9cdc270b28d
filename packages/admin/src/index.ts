export { InvalidInstanceNameError, InvalidTableNameError } from "./core/errors"
export { InstanceName } from "./core/instance-name"
export {
  toCreateTableRequest,
  toDropRowRangeRequest,
  toModifyColumnFamiliesRequest,
  toTable,
} from "./core/mappers"
export { TableAdminClient, type TableAdminClientDeps } from "./core/table-admin-client"
export type * from "./ports/messages"
export type * from "./ports/models"
export type { TableAdminRpc } from "./ports/table-admin-rpc"
