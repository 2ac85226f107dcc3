// src/migrations/cli.ts
// Usage: npm run migrate -- [up|down|status]

import { createAdapter } from "../db";
import { createLogger } from "../observability/logger";
import { MigrationRunner } from "./runner";

const log = createLogger("migrate");

async function main(command: string): Promise<number> {
  const db = createAdapter();
  const runner = new MigrationRunner(db);
  try {
    switch (command) {
      case "up": {
        const { applied, failed } = await runner.runAll();
        log.info({ applied }, `${applied.length} migration(s) applied`);
        return failed ? 1 : 0;
      }
      case "down": {
        const name = await runner.rollbackLast();
        log.info({ migration: name }, name ? "Rolled back" : "Nothing to roll back");
        return 0;
      }
      case "status": {
        for (const m of await runner.getStatus()) {
          log.info({ migration: `${m.version}_${m.name}`, applied: m.applied, appliedAt: m.appliedAt });
        }
        return 0;
      }
      default:
        log.error(`Unknown command: ${command}`);
        return 2;
    }
  } finally {
    await db.close();
  }
}

main(process.argv[2] ?? "up").then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    log.error({ err }, "Migration command failed");
    process.exitCode = 1;
  }
);
