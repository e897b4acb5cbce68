export { runTimeScenario, type TimeScenarioOptions } from './time.js';
export { runPositionScenario, type PositionScenarioOptions } from './position.js';
export { runStickyScenario, STICKY_USERS } from './sticky.js';
export { runLagScenario, type LagSource } from './lag.js';
export { reportRead, sleep, type ScenarioContext, type ScenarioStep } from './types.js';
