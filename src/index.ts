#!/usr/bin/env node
import { createLogger } from './core/Logger';
import { loadSettings, VEHICLE_PROFILE } from './core/Config';
import { Actions } from './core/Actions';
import { RandomWindowDetector } from './core/Detection';
import { SeededRandom } from './core/Random';
import { MissionController } from './mission/MissionController';
import { StateMachine } from './mission/StateMachine';
import { TakeoffState } from './mission/states/TakeoffState';
import type { IStateContext } from './mission/State';

// Keep FSM reference for graceful shutdown
let _fsm: StateMachine | null = null;
let _shuttingDown = false;

function setupShutdown(logger: ReturnType<typeof createLogger>) {
  const shutdown = (signal: string) => {
    if (_shuttingDown) return;
    _shuttingDown = true;
    logger.info(`Shutdown requested (${signal}). Stopping mission runner...`);
    _fsm?.stop();
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

async function main() {
  const settings = loadSettings();
  const logger = createLogger({ level: settings.logLevel });
  setupShutdown(logger);

  logger.info(`Starting mission (seed=${settings.seed}, scan=${settings.mission.scanSeconds}s)`);
  // разные потоки для гейта детекций и геометрии окон, чтобы они не влияли друг на друга
  const mission = new MissionController({
    effector: new Actions(settings.actions, VEHICLE_PROFILE, logger),
    detector: new RandomWindowDetector(new SeededRandom(settings.seed + 1)),
    rng: new SeededRandom(settings.seed),
    logger,
  });

  const ctx: IStateContext = {
    log: (msg: string) => logger.info(msg),
    mission,
    scanSeconds: settings.mission.scanSeconds,
  };
  const fsm = new StateMachine(new TakeoffState(), ctx);
  _fsm = fsm;
  await fsm.start(20);

  const s = mission.summarize();
  logger.info(`Mission complete. Cleaned ${s.windowsCleaned}/${s.windowsTotal} windows`);
  logger.info(`Final state ${s.finalState}, battery ${s.battery.toFixed(1)}%, fluid ${s.fluid.toFixed(1)}%, elapsed ${s.elapsedSeconds.toFixed(1)}s, est. cleaning ${s.estimatedCleaningMinutes.toFixed(1)} min`);
}

main().catch((e) => {
  // Last-chance error log to console
  // eslint-disable-next-line no-console
  console.error(e);
  process.exit(1);
});
