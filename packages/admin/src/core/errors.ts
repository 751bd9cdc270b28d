import { BaseError } from "@tether/errors"

export class InvalidInstanceNameError extends BaseError<"invalid_instance_name"> {
  constructor(name: string) {
    super(`Invalid instance name "${name}"; expected projects/{project}/instances/{instance}`, {
      code: "invalid_instance_name",
      context: { name },
    })
  }
}

/** A table name that is malformed or belongs to a different instance. */
export class InvalidTableNameError extends BaseError<"invalid_table_name"> {
  constructor(tableName: string, instanceName: string) {
    super(`Table "${tableName}" does not belong to instance "${instanceName}"`, {
      code: "invalid_table_name",
      context: { tableName, instanceName },
    })
  }
}
