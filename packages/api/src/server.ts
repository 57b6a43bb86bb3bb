import { createHTTPServer } from "@trpc/server/adapters/standalone";
import cors from "cors";
import { loadSimulationConfig } from "@muster/simulation";
import { InMemoryRosterRepository, seedData } from "@muster/roster";
import { appRouter } from "./app-router.js";
import { loadHostConfig } from "./config.js";
import { SimulationService } from "./simulation-service.js";
import { SqliteCycleStore } from "./cycle-store/sqlite-cycle-store.js";
import { SqliteScheduleStore } from "./schedule-store/sqlite-schedule-store.js";
import type { Context } from "./trpc.js";

async function main() {
  const env = loadHostConfig();

  const roster = new InMemoryRosterRepository();
  await roster.connect();
  await seedData(roster);

  const store = new SqliteCycleStore(env.MUSTER_DB_PATH);
  const simulation = new SimulationService(roster, store, {
    config: loadSimulationConfig(env.MUSTER_CONFIG_DIR),
    startDate: env.MUSTER_START_DATE,
    seed: env.MUSTER_SEED,
    schedule: new SqliteScheduleStore(env.MUSTER_DB_PATH),
    eventLogCapacity: env.MUSTER_EVENT_LOG_CAPACITY,
  });

  console.log(`Seeded ${(await roster.getAllCharacters()).length} characters`);
  console.log(`Simulation ready on ${simulation.currentDate}`);

  const server = createHTTPServer({
    middleware: cors(),
    router: appRouter,
    createContext: (): Context => ({ roster, simulation }),
  });

  server.listen(env.PORT);
  console.log(`API server listening on http://localhost:${env.PORT}`);
}

main().catch(console.error);
