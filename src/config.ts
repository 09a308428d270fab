import type { LogLevel } from './logging';

export const RIG_TOOL_ID = 'rigsmith';
export const RIG_DOCUMENT_VERSION = 1;

export const DEFAULT_LOG_LEVEL: LogLevel = 'info';
export const DEFAULT_JOINT_SPACING = 5;
export const DEFAULT_VECTOR_TIP_OFFSET = 1;
export const DEFAULT_ANGLE_NORMALIZATION = 180;

export type ChainShrinkPolicy = 'flag' | 'cascade';
export type ModuleErrorPolicy = 'abort' | 'continue';

export type RigConfig = {
  logLevel: LogLevel;
  /** Local X offset given to every joint a chain grows. */
  jointSpacing: number;
  /** Distance of the fallback vector tip along the base's local +X. */
  vectorTipOffset: number;
  /** Divisor turning the signed angle (degrees) into the corrective driving value. */
  angleNormalization: number;
  chainShrinkPolicy: ChainShrinkPolicy;
  onModuleError: ModuleErrorPolicy;
};

export const DEFAULT_RIG_CONFIG: Readonly<RigConfig> = {
  logLevel: DEFAULT_LOG_LEVEL,
  jointSpacing: DEFAULT_JOINT_SPACING,
  vectorTipOffset: DEFAULT_VECTOR_TIP_OFFSET,
  angleNormalization: DEFAULT_ANGLE_NORMALIZATION,
  chainShrinkPolicy: 'flag',
  onModuleError: 'abort'
};

export type RigEnv = Record<string, string | undefined>;

export const resolveLogLevel = (raw: string | undefined, fallback: LogLevel): LogLevel => {
  const normalized = String(raw ?? '').trim().toLowerCase();
  if (normalized === 'debug' || normalized === 'info' || normalized === 'warn' || normalized === 'error') {
    return normalized;
  }
  return fallback;
};

export const resolvePositiveNumber = (raw: string | undefined, fallback: number): number => {
  if (raw === undefined || raw.trim() === '') return fallback;
  const numeric = Number(raw);
  if (!Number.isFinite(numeric) || numeric <= 0) {
    return fallback;
  }
  return numeric;
};

export const resolveChainShrinkPolicy = (raw: string | undefined, fallback: ChainShrinkPolicy): ChainShrinkPolicy => {
  const normalized = String(raw ?? '').trim().toLowerCase();
  if (normalized === 'flag' || normalized === 'cascade') return normalized;
  return fallback;
};

export const resolveModuleErrorPolicy = (raw: string | undefined, fallback: ModuleErrorPolicy): ModuleErrorPolicy => {
  const normalized = String(raw ?? '').trim().toLowerCase();
  if (normalized === 'abort' || normalized === 'continue') return normalized;
  return fallback;
};

export const resolveRigConfig = (env: RigEnv = process.env, overrides: Partial<RigConfig> = {}): RigConfig => {
  const base = DEFAULT_RIG_CONFIG;
  const resolved: RigConfig = {
    logLevel: resolveLogLevel(env.RIGSMITH_LOG_LEVEL, base.logLevel),
    jointSpacing: resolvePositiveNumber(env.RIGSMITH_JOINT_SPACING, base.jointSpacing),
    vectorTipOffset: resolvePositiveNumber(env.RIGSMITH_VECTOR_TIP_OFFSET, base.vectorTipOffset),
    angleNormalization: resolvePositiveNumber(env.RIGSMITH_ANGLE_NORMALIZATION, base.angleNormalization),
    chainShrinkPolicy: resolveChainShrinkPolicy(env.RIGSMITH_CHAIN_SHRINK, base.chainShrinkPolicy),
    onModuleError: resolveModuleErrorPolicy(env.RIGSMITH_ON_MODULE_ERROR, base.onModuleError)
  };
  return { ...resolved, ...overrides };
};
