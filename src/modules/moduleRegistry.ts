import { UnknownModuleError } from '../shared/errors';
import { RIG_MODULE_TYPE_UNKNOWN, RIG_MODULE_TYPE_UNKNOWN_FIX } from '../shared/messages';
import { CHAIN_MODULE_TYPE, ChainModule } from './ChainModule';
import { CORRECTIVE_MODULE_TYPE, CorrectiveModule } from './CorrectiveModule';
import type { RigModule, RigModuleInit } from './RigModule';
import type { RigModuleContext } from './types';

export type RigModuleFactory = (context: RigModuleContext, init?: RigModuleInit) => RigModule;

export type ModuleRegistry = ReadonlyMap<string, RigModuleFactory>;

export const DEFAULT_MODULE_FACTORIES: ModuleRegistry = new Map<string, RigModuleFactory>([
  [CHAIN_MODULE_TYPE, (context, init) => new ChainModule(context, init)],
  [CORRECTIVE_MODULE_TYPE, (context, init) => new CorrectiveModule(context, init)]
]);

export const createModule = (
  registry: ModuleRegistry,
  type: string,
  context: RigModuleContext,
  init?: RigModuleInit
): RigModule => {
  const factory = registry.get(type);
  if (!factory) {
    const known = [...registry.keys()];
    throw new UnknownModuleError(RIG_MODULE_TYPE_UNKNOWN(type), {
      fix: RIG_MODULE_TYPE_UNKNOWN_FIX(known),
      details: { type, known }
    });
  }
  return factory(context, init);
};
