import "dotenv/config";
import path from "path";
import { globalRegistry } from "@quarry/sdk";
import type { Pool } from "pg";
import { EngineConfig, loadConfig } from "./config";
import { createPool, TransactionManager } from "./db";
import { DefinitionRepository } from "./repositories/definition.repository";
import { RunRepository } from "./repositories/run.repository";
import { PassController } from "./services";
import { createLimiter } from "./utils/limiter";
import { parseSchedule } from "./utils/schedule";

const TAG = "[quarry]";

interface Engine {
  pool: Pool;
  controller: PassController;
  definitions: DefinitionRepository;
}

let engine: Engine | null = null;

function createEngine(config: EngineConfig): Engine {
  const pool = createPool(config.databaseUrl);
  pool.on("error", (err) => console.error(`${TAG} idle client error:`, err));

  const runs = new RunRepository(pool, config.maxPayloadBytes);
  const definitions = new DefinitionRepository(new TransactionManager(pool));
  const controller = new PassController(globalRegistry, runs, {
    limiter: createLimiter(config.maxConcurrentSteps),
    stepTimeoutMs: config.stepTimeoutMs,
    maxPayloadBytes: config.maxPayloadBytes,
    retry: {
      initialIntervalMs: config.retryInitialMs,
      maxIntervalMs: config.retryMaxMs,
    },
  });
  return { pool, controller, definitions };
}

// Definition modules register their tasks, stage graphs and workflows on the
// global registry as a side effect of being loaded.
function loadDefinitions(paths: string[]): void {
  if (paths.length === 0) {
    console.warn(`${TAG} WARNING: QUARRY_DEFINITIONS is not set. No workflows will be available.`);
    return;
  }
  for (const p of paths) {
    const resolved = path.resolve(process.cwd(), p);
    require(resolved);
    console.log(`${TAG} loaded definitions from: ${resolved}`);
  }
}

async function main() {
  const config = loadConfig();
  console.log(`${TAG} starting engine... (max concurrent steps: ${config.maxConcurrentSteps})`);

  engine = createEngine(config);
  const { pool, controller, definitions } = engine;

  await pool.query("SELECT 1");
  console.log(`${TAG} postgres connected`);

  loadDefinitions(config.definitions);

  const synced = await definitions.sync(globalRegistry);
  console.log(
    `${TAG} definitions synced (${synced.tasks} tasks, ${synced.stageGraphs} stage graphs, ${synced.workflows} workflows)`,
  );

  for (const entry of config.schedules) {
    controller.scheduledPass(entry.workflow, parseSchedule(entry.schedule));
  }

  console.log(`${TAG} engine ready (${config.schedules.length} schedules)`);
}

async function shutdown(signal: string) {
  console.log(`${TAG} ${signal} received, shutting down...`);

  if (engine) {
    await engine.controller.shutdown();
    await engine.pool.end();
  }
  console.log(`${TAG} shutdown complete`);
  process.exit(0);
}

function onSignal(signal: string) {
  shutdown(signal).catch((err) => {
    console.error(`${TAG} shutdown failed:`, err);
    process.exit(1);
  });
}

process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));

main().catch((err) => {
  console.error(`${TAG} fatal:`, err);
  process.exit(1);
});
