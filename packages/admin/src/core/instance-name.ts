import { InvalidInstanceNameError, InvalidTableNameError } from "./errors"

const SEGMENT = /^[A-Za-z0-9_.-]+$/
const INSTANCE_NAME = /^projects\/([^/]+)\/instances\/([^/]+)$/

/** `projects/{projectId}/instances/{instanceId}` */
export class InstanceName {
  readonly projectId: string
  readonly instanceId: string

  constructor(projectId: string, instanceId: string) {
    if (!SEGMENT.test(projectId) || !SEGMENT.test(instanceId)) {
      throw new InvalidInstanceNameError(`projects/${projectId}/instances/${instanceId}`)
    }

    this.projectId = projectId
    this.instanceId = instanceId
  }

  static parse(name: string): InstanceName {
    const match = INSTANCE_NAME.exec(name)
    const [, projectId, instanceId] = match ?? []

    if (projectId === undefined || instanceId === undefined) {
      throw new InvalidInstanceNameError(name)
    }

    return new InstanceName(projectId, instanceId)
  }

  toString(): string {
    return `projects/${this.projectId}/instances/${this.instanceId}`
  }

  toTableName(tableId: string): string {
    return `${this.tableNamePrefix()}${tableId}`
  }

  /** @throws InvalidTableNameError for names outside this instance */
  toTableId(tableName: string): string {
    const prefix = this.tableNamePrefix()
    const tableId = tableName.slice(prefix.length)

    if (!tableName.startsWith(prefix) || tableId === "" || tableId.includes("/")) {
      throw new InvalidTableNameError(tableName, this.toString())
    }

    return tableId
  }

  toClusterName(clusterId: string): string {
    return `${this}/clusters/${clusterId}`
  }

  toSnapshotName(clusterId: string, snapshotId: string): string {
    return `${this.toClusterName(clusterId)}/snapshots/${snapshotId}`
  }

  private tableNamePrefix(): string {
    return `${this}/tables/`
  }
}
