import { runTests as runGeometry } from './geometry.test';
import { runTests as runRegistry } from './windowRegistry.test';
import { runTests as runPlanner } from './pathPlanner.test';
import { runTests as runResources } from './resourceManager.test';
import { runTests as runConfig } from './config.test';
import { runTests as runActions } from './actions.test';
import { runTests as runMotion } from './motionExecutor.test';
import { runTests as runMission } from './missionController.test';
import { runTests as runStateMachine } from './stateMachine.test';

async function main() {
  try {
    runGeometry();
    runRegistry();
    runPlanner();
    runResources();
    runConfig();
    await runActions();
    await runMotion();
    await runMission();
    await runStateMachine();
    console.log('All tests passed');
    process.exit(0);
  } catch (e) {
    console.error('Tests failed:', e instanceof Error ? e.message : String(e));
    process.exit(1);
  }
}

void main();
