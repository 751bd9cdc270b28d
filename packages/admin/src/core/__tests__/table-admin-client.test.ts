import { FakeClock } from "@tether/clock"
import { type CallHandle, CancelledError } from "@tether/future"
import { CallFailedError, StatusCode } from "@tether/retry"
import { fail, pending, reply, ScriptedTransport } from "@tether/retry/testing"
import type { TableMessage } from "../../ports/messages"
import type { TableAdminRpc } from "../../ports/table-admin-rpc"
import { InvalidTableNameError } from "../errors"
import { InstanceName } from "../instance-name"
import { TableAdminClient } from "../table-admin-client"

const instance = new InstanceName("p1", "i1")
const tableName = (id: string) => `projects/p1/instances/i1/tables/${id}`

type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown }

function settled<T>(handle: CallHandle<T>): Promise<Settled<T>> {
  return handle.then(
    (value) => ({ ok: true, value }),
    (error: unknown) => ({ ok: false, error }),
  )
}

describe("TableAdminClient", () => {
  let clock: FakeClock

  beforeEach(() => {
    clock = new FakeClock(0)
  })

  function makeClient(rpc: Partial<TableAdminRpc>) {
    const full: TableAdminRpc = {
      createTable: new ScriptedTransport([]),
      getTable: new ScriptedTransport([]),
      listTables: new ScriptedTransport([]),
      deleteTable: new ScriptedTransport([]),
      modifyColumnFamilies: new ScriptedTransport([]),
      dropRowRange: new ScriptedTransport([]),
      snapshotTable: new ScriptedTransport([]),
      getSnapshot: new ScriptedTransport([]),
      listSnapshots: new ScriptedTransport([]),
      deleteSnapshot: new ScriptedTransport([]),
      createTableFromSnapshot: new ScriptedTransport([]),
      ...rpc,
    }

    return new TableAdminClient({ rpc: full, instance, clock, options: { jitterFraction: 0 } })
  }

  const usersTable: TableMessage = {
    name: tableName("users"),
    columnFamilies: { profile: { gcRule: { maxNumVersions: 1 } } },
  }

  it("creates a table and returns it by short id", async () => {
    const createTable = new ScriptedTransport([reply(usersTable)])
    const client = makeClient({ createTable })

    const result = await settled(
      client.createTable({ tableId: "users", families: { profile: { maxNumVersions: 1 } } }),
    )

    expect(result).toEqual({
      ok: true,
      value: { id: "users", columnFamilies: { profile: { gcRule: { maxNumVersions: 1 } } } },
    })
    expect(createTable.submissions[0]?.request).toEqual({
      parent: "projects/p1/instances/i1",
      tableId: "users",
      table: { columnFamilies: { profile: { gcRule: { maxNumVersions: 1 } } } },
    })
  })

  it("gets a table by its qualified name", async () => {
    const getTable = new ScriptedTransport([reply(usersTable)])
    const client = makeClient({ getTable })

    await expect(client.getTable("users")).resolves.toMatchObject({ id: "users" })
    expect(getTable.submissions[0]?.request).toEqual({ name: tableName("users") })
  })

  it("settles as soon as the transport answers", () => {
    const getTable = new ScriptedTransport([reply(usersTable)])
    const client = makeClient({ getTable })

    expect(client.getTable("users").isDone()).toBe(true)
  })

  it("lists table ids", async () => {
    const listTables = new ScriptedTransport([
      reply({ tables: [{ name: tableName("users") }, { name: tableName("events") }] }),
    ])
    const client = makeClient({ listTables })

    await expect(client.listTables()).resolves.toEqual(["users", "events"])
    expect(listTables.submissions[0]?.request).toEqual({ parent: "projects/p1/instances/i1" })
  })

  it("fails the listing when a table belongs to another instance", async () => {
    const listTables = new ScriptedTransport([
      reply({ tables: [{ name: "projects/p1/instances/other/tables/users" }] }),
    ])
    const client = makeClient({ listTables })

    const result = await settled(client.listTables())

    expect(result.ok === false && result.error).toBeInstanceOf(InvalidTableNameError)
  })

  it("deletes a table", async () => {
    const deleteTable = new ScriptedTransport([reply({})])
    const client = makeClient({ deleteTable })

    await expect(client.deleteTable("users")).resolves.toBeUndefined()
    expect(deleteTable.submissions[0]?.request).toEqual({ name: tableName("users") })
  })

  it("modifies column families", async () => {
    const modifyColumnFamilies = new ScriptedTransport([reply(usersTable)])
    const client = makeClient({ modifyColumnFamilies })

    await client.modifyFamilies({
      tableId: "users",
      modifications: [{ kind: "drop", family: "legacy" }],
    })

    expect(modifyColumnFamilies.submissions[0]?.request).toEqual({
      name: tableName("users"),
      modifications: [{ id: "legacy", drop: true }],
    })
  })

  describe("dropRowRange", () => {
    it("drops every row without a prefix", async () => {
      const dropRowRange = new ScriptedTransport([reply({})])
      const client = makeClient({ dropRowRange })

      await expect(client.dropRowRange("users")).resolves.toBeUndefined()
      expect(dropRowRange.submissions[0]?.request).toEqual({
        name: tableName("users"),
        deleteAllDataFromTable: true,
      })
    })

    it("drops rows under a prefix", async () => {
      const dropRowRange = new ScriptedTransport([reply({})])
      const client = makeClient({ dropRowRange })

      await client.dropRowRange("users", "ab")

      expect(dropRowRange.submissions[0]?.request).toEqual({
        name: tableName("users"),
        deleteAllDataFromTable: false,
        rowKeyPrefix: new Uint8Array([0x61, 0x62]),
      })
    })
  })

  describe("snapshots", () => {
    const snapshotName = instance.toSnapshotName("c1", "daily")

    it("passes snapshot requests and responses through", async () => {
      const snapshotTable = new ScriptedTransport([reply({ name: "operations/op-1", done: false })])
      const getSnapshot = new ScriptedTransport([reply({ name: snapshotName, state: "READY" as const })])
      const client = makeClient({ snapshotTable, getSnapshot })

      const request = {
        name: tableName("users"),
        cluster: instance.toClusterName("c1"),
        snapshotId: "daily",
        ttlMs: 3_600_000,
      }

      await expect(client.snapshotTable(request)).resolves.toEqual({
        name: "operations/op-1",
        done: false,
      })
      expect(snapshotTable.submissions[0]?.request).toBe(request)
      await expect(client.getSnapshot({ name: snapshotName })).resolves.toEqual({
        name: snapshotName,
        state: "READY",
      })
    })

    it("lists, deletes and restores snapshots", async () => {
      const listSnapshots = new ScriptedTransport([reply({ snapshots: [] })])
      const deleteSnapshot = new ScriptedTransport([reply({})])
      const createTableFromSnapshot = new ScriptedTransport([
        reply({ name: "operations/op-2", done: true }),
      ])
      const client = makeClient({ listSnapshots, deleteSnapshot, createTableFromSnapshot })

      await expect(
        client.listSnapshots({ parent: instance.toClusterName("-") }),
      ).resolves.toEqual({ snapshots: [] })
      await expect(client.deleteSnapshot({ name: snapshotName })).resolves.toBeUndefined()
      await expect(
        client.createTableFromSnapshot({
          parent: instance.toString(),
          tableId: "users-restored",
          sourceSnapshot: snapshotName,
        }),
      ).resolves.toEqual({ name: "operations/op-2", done: true })
    })
  })

  describe("retries", () => {
    it("retries transient failures behind the same handle", async () => {
      const getTable = new ScriptedTransport([fail(StatusCode.UNAVAILABLE), reply(usersTable)])
      const client = makeClient({ getTable })

      const handle = client.getTable("users")
      expect(handle.isDone()).toBe(false)

      clock.advance(100)

      await expect(handle).resolves.toMatchObject({ id: "users" })
      expect(getTable.attempts).toBe(2)
    })

    it("surfaces permanent failures unchanged", async () => {
      const getTable = new ScriptedTransport([fail(StatusCode.NOT_FOUND, "no such table")])
      const client = makeClient({ getTable })

      const result = await settled(client.getTable("missing"))

      expect(result.ok === false && result.error).toBeInstanceOf(CallFailedError)
      expect(result.ok === false && result.error).toMatchObject({ status: StatusCode.NOT_FOUND })
    })

    it("cancels the underlying call", async () => {
      const getTable = new ScriptedTransport([pending()])
      const client = makeClient({ getTable })

      const handle = client.getTable("users")
      expect(handle.cancel("no longer needed")).toBe(true)

      const result = await settled(handle)

      expect(result.ok === false && result.error).toBeInstanceOf(CancelledError)
      expect(getTable.submissions[0]?.cancelledWith).toBe("no longer needed")
    })
  })
})
