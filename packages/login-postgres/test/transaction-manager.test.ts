import { describe, expect, it } from "vitest";

import { ConfigurationError } from "@relogin/contracts";

import {
  createPostgresTelemetry,
  PostgresTransactionManager,
  type PgTransactionClient,
  type PgTransactionPool,
} from "../src/index.js";

class RecordingClient implements PgTransactionClient {
  readonly statements: string[] = [];
  released = 0;

  constructor(private readonly failOn?: string) {}

  async query(text: string) {
    this.statements.push(text);
    if (text === this.failOn) {
      throw new Error(`${text} failed`);
    }
    return { rows: [] };
  }

  release(): void {
    this.released += 1;
  }
}

const poolOf = (client: RecordingClient): PgTransactionPool => ({
  connect: async () => client,
});

const telemetry = createPostgresTelemetry();

describe("PostgresTransactionManager", () => {
  it("wraps the callback in BEGIN and COMMIT and releases the client", async () => {
    const client = new RecordingClient();
    const manager = new PostgresTransactionManager({ pool: poolOf(client), telemetry });

    const result = await manager.runInTransaction("put", async (executor) => {
      await executor.query("SELECT 1");
      return "done";
    });

    expect(result).toBe("done");
    expect(client.statements).toEqual(["BEGIN", "SELECT 1", "COMMIT"]);
    expect(client.released).toBe(1);
  });

  it("rolls back and rethrows when the callback fails", async () => {
    const client = new RecordingClient();
    const manager = new PostgresTransactionManager({ pool: poolOf(client), telemetry });

    await expect(
      manager.runInTransaction("put", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(client.statements).toEqual(["BEGIN", "ROLLBACK"]);
    expect(client.released).toBe(1);
  });

  it("keeps the original error when the rollback fails too", async () => {
    const client = new RecordingClient("ROLLBACK");
    const manager = new PostgresTransactionManager({ pool: poolOf(client), telemetry });

    await expect(
      manager.runInTransaction("delete", async (executor) => {
        await executor.query("DELETE FROM somewhere");
        throw new Error("first failure");
      }),
    ).rejects.toThrow("first failure");

    expect(client.statements).toEqual(["BEGIN", "DELETE FROM somewhere", "ROLLBACK"]);
    expect(client.released).toBe(1);
  });

  it("runs inline on a bare executor", async () => {
    const seen: string[] = [];
    const manager = new PostgresTransactionManager({
      executor: {
        query: async (sql) => {
          seen.push(sql);
          return { rows: [{ value: 1 }] };
        },
      },
      telemetry,
    });

    const rows = await manager.runInTransaction("get", async (executor) => (await executor.query("SELECT 1")).rows);

    expect(rows).toEqual([{ value: 1 }]);
    expect(seen).toEqual(["SELECT 1"]);
  });

  it("requires a pool or an executor", () => {
    expect(() => new PostgresTransactionManager({ telemetry })).toThrow(ConfigurationError);
  });
});
