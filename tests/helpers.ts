import { DEFAULT_RIG_CONFIG, type RigConfig } from '../src/config';
import type { Logger, LogLevel, LogMeta } from '../src/logging';
import { Rig } from '../src/rig/Rig';
import { SceneGraphSim } from './support/sim/SceneGraphSim';

export const noopLog: Logger = {
  log: () => undefined,
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};

export type LogEntry = { level: LogLevel; message: string; meta?: LogMeta };

export type MemoryLogger = Logger & { entries: LogEntry[] };

export const createMemoryLogger = (): MemoryLogger => {
  const entries: LogEntry[] = [];
  const log = (level: LogLevel, message: string, meta?: LogMeta) => {
    entries.push(meta ? { level, message, meta } : { level, message });
  };
  return {
    entries,
    log,
    debug: (message, meta) => log('debug', message, meta),
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta) => log('error', message, meta)
  };
};

export type RigHarness = {
  scene: SceneGraphSim;
  rig: Rig;
  logger: MemoryLogger;
  /** An external joint at the world origin, registered with the rig. */
  root: string;
};

export const createRigHarness = (config: Partial<RigConfig> = {}): RigHarness => {
  const scene = new SceneGraphSim();
  const logger = createMemoryLogger();
  const rig = new Rig({ scene, logger, config: { ...DEFAULT_RIG_CONFIG, ...config }, name: 'testRig' });
  const root = scene.createNode('joint', 'root');
  rig.registerExternalJoint(root);
  return { scene, rig, logger, root };
};

export const assertClose = (actual: number, expected: number, epsilon = 1e-6): void => {
  if (Math.abs(actual - expected) > epsilon) {
    throw new Error(`expected ${actual} to be within ${epsilon} of ${expected}`);
  }
};

export const assertVecClose = (actual: readonly number[], expected: readonly number[], epsilon = 1e-6): void => {
  if (actual.length !== expected.length) {
    throw new Error(`expected a vector of length ${expected.length}, got ${actual.length}`);
  }
  actual.forEach((value, index) => {
    if (Math.abs(value - expected[index]) > epsilon) {
      throw new Error(`component ${index}: expected [${actual.join(', ')}] to be close to [${expected.join(', ')}]`);
    }
  });
};
