import { RIG_DOCUMENT_VERSION, RIG_TOOL_ID, resolveRigConfig, type RigConfig } from '../config';
import { resolveBuildOrder } from '../domain/buildOrder';
import { ConsoleLogger, type Logger } from '../logging';
import { createModule, DEFAULT_MODULE_FACTORIES, type ModuleRegistry } from '../modules/moduleRegistry';
import type { RigModule } from '../modules/RigModule';
import type { BuildRoots, RigModuleContext, RigModuleHost } from '../modules/types';
import type { SceneGraphPort } from '../ports/sceneGraph';
import { toRigErrorPayload, UnknownModuleError, ValidationError } from '../shared/errors';
import {
  RIG_BUILD_MODULE_FAILED,
  RIG_MODULE_AMBIGUOUS,
  RIG_MODULE_EXISTS,
  RIG_MODULE_EXISTS_FIX,
  RIG_MODULE_NOT_FOUND
} from '../shared/messages';
import { fail, ok, type RigResult } from '../shared/result';
import type { NodeRef } from '../types/scene';
import { EXTERNAL_OWNER, JointRegistry, type JointOwner } from './JointRegistry';
import { parseRigDocument, type RigDocument } from './rigDocument';

export const RIG_CONTROLS_GROUP = 'rig_controls_grp';
export const RIG_EXTRAS_GROUP = 'rig_extras_grp';

export type RigDeps = {
  scene: SceneGraphPort;
  name?: string;
  logger?: Logger;
  config?: RigConfig;
  registry?: ModuleRegistry;
};

export type ModuleBuildOutcome = {
  module: string;
  result: RigResult<null>;
};

export type BuildReport = {
  ok: boolean;
  order: string[];
  outcomes: ModuleBuildOutcome[];
};

export type ModuleFactory<M extends RigModule> = (context: RigModuleContext) => M;

/** Owns the modules of one rig, the registry their joint references resolve through, and the build roots. */
export class Rig implements RigModuleHost {
  readonly name: string;
  private readonly scene: SceneGraphPort;
  private readonly logger: Logger;
  private readonly config: RigConfig;
  private readonly registry: ModuleRegistry;
  private readonly joints = new JointRegistry();
  private readonly moduleList: RigModule[] = [];
  private roots: BuildRoots | null = null;

  constructor(deps: RigDeps) {
    this.name = deps.name ?? 'rig';
    this.scene = deps.scene;
    this.config = deps.config ?? resolveRigConfig();
    this.logger = deps.logger ?? new ConsoleLogger(RIG_TOOL_ID, this.config.logLevel);
    this.registry = deps.registry ?? DEFAULT_MODULE_FACTORIES;
  }

  static fromDocument(raw: unknown, deps: RigDeps): Rig {
    const document = parseRigDocument(raw);
    const rig = new Rig({ ...deps, name: document.name });
    for (const joint of document.externalJoints) {
      rig.registerExternalJoint(joint);
    }
    if (document.groups.controls !== null && document.groups.extras !== null) {
      rig.roots = { controls: document.groups.controls, extras: document.groups.extras };
    }
    for (const record of document.modules) {
      const module = createModule(rig.registry, record.type, rig.context, { fields: record.fields, persisted: true });
      rig.assertUniqueNodeName(module.nodeName);
      rig.moduleList.push(module);
      for (const joint of module.deformJoints.get()) {
        rig.joints.register(joint, module);
      }
    }
    rig.logger.debug('rig loaded', { rig: rig.name, modules: rig.moduleList.length });
    return rig;
  }

  get context(): RigModuleContext {
    return { scene: this.scene, host: this, logger: this.logger, config: this.config };
  }

  get buildRoots(): BuildRoots | null {
    return this.roots;
  }

  modules(): readonly RigModule[] {
    return [...this.moduleList];
  }

  resolveJoint(ref: NodeRef): NodeRef | null {
    return this.joints.resolve(ref);
  }

  registerJoint(ref: NodeRef, owner: RigModule): void {
    this.joints.register(ref, owner);
  }

  unregisterJoints(refs: readonly NodeRef[]): void {
    this.joints.unregister(refs);
  }

  /** Makes a joint the rig did not create (a skeleton root, say) available as a parent. */
  registerExternalJoint(ref: NodeRef): void {
    this.joints.register(ref, EXTERNAL_OWNER);
  }

  ownerOf(ref: NodeRef): JointOwner | undefined {
    return this.joints.ownerOf(ref);
  }

  /** Looks a module up by node name (`arm_L`), or by bare name while only one side carries it. */
  findModule(key: string): RigModule | undefined {
    const exact = this.moduleList.find((module) => module.nodeName === key);
    if (exact) return exact;
    const named = this.modulesNamed(key);
    return named.length === 1 ? named[0] : undefined;
  }

  module(key: string): RigModule {
    const module = this.findModule(key);
    if (!module) {
      const named = this.modulesNamed(key).map((entry) => entry.nodeName);
      throw new UnknownModuleError(named.length > 1 ? RIG_MODULE_AMBIGUOUS(key, named) : RIG_MODULE_NOT_FOUND(key), {
        details: { name: key, known: this.moduleList.map((entry) => entry.nodeName) }
      });
    }
    return module;
  }

  /** Creates a module against this rig and initializes it. */
  add<M extends RigModule>(factory: ModuleFactory<M>): M {
    const module = factory(this.context);
    this.assertUniqueNodeName(module.nodeName);
    this.moduleList.push(module);
    try {
      module.initialize();
    } catch (err) {
      this.moduleList.splice(this.moduleList.indexOf(module), 1);
      const partial = module.deformJoints.get();
      this.joints.unregister(partial);
      if (partial.length > 0) this.scene.deleteNodes(partial);
      throw err;
    }
    this.logger.debug('module added', { module: module.nodeName, type: module.moduleType });
    return module;
  }

  addModule(type: string, fields: Record<string, unknown> = {}): RigModule {
    return this.add((context) => createModule(this.registry, type, context, { fields }));
  }

  /** Validated edit of one field, followed by that module's reconciliation. */
  setModuleField(name: string, key: string, value: unknown): void {
    const module = this.module(name);
    if ((key === 'name' || key === 'side') && typeof value === 'string') {
      const next = key === 'name' ? `${value}_${module.side.get()}` : `${module.name.get()}_${value}`;
      if (next !== module.nodeName) this.assertUniqueNodeName(next);
    }
    module.setField(key, value);
    module.update();
  }

  update(): void {
    for (const module of this.moduleList) {
      module.update();
    }
  }

  /** Clears any previous build output, then builds every module after the owners of what it depends on. */
  build(): BuildReport {
    this.unbuild();
    const roots: BuildRoots = {
      controls: this.scene.createNode('transform', RIG_CONTROLS_GROUP),
      extras: this.scene.createNode('transform', RIG_EXTRAS_GROUP)
    };
    this.roots = roots;

    const order = resolveBuildOrder(this.moduleList, (ref) => this.joints.moduleOf(ref));
    const outcomes: ModuleBuildOutcome[] = [];
    for (const module of order) {
      const label = module.nodeName;
      try {
        module.buildInto(roots);
        outcomes.push({ module: label, result: ok(null) });
      } catch (err) {
        if (this.config.onModuleError === 'abort') throw err;
        const error = toRigErrorPayload(err);
        this.logger.error(RIG_BUILD_MODULE_FAILED(label), { module: label, error });
        outcomes.push({ module: label, result: fail(error) });
      }
    }
    const report: BuildReport = {
      ok: outcomes.every((outcome) => outcome.result.ok),
      order: order.map((module) => module.nodeName),
      outcomes
    };
    this.logger.debug('rig built', { order: report.order, ok: report.ok });
    return report;
  }

  unbuild(): void {
    for (const module of this.moduleList) {
      module.clearBuild();
    }
    if (this.roots) {
      this.scene.deleteNodes([this.roots.controls, this.roots.extras]);
      this.roots = null;
    }
  }

  rebuild(): BuildReport {
    this.update();
    return this.build();
  }

  publish(): void {
    for (const module of this.moduleList) {
      module.publish();
    }
  }

  /** Removes a module with its build output and joints; modules hanging from those joints are redirected first. */
  removeModule(name: string): void {
    const module = this.module(name);
    module.clearBuild();
    module.teardown();
    this.moduleList.splice(this.moduleList.indexOf(module), 1);
    this.logger.debug('module removed', { module: module.nodeName });
  }

  toDocument(): RigDocument {
    for (const module of this.moduleList) {
      if (module.buildNodes.get().length > 0) module.capturePersistentAttributes();
    }
    const document: RigDocument = {
      version: RIG_DOCUMENT_VERSION,
      name: this.name,
      externalJoints: this.joints.externalJoints(),
      groups: { controls: this.roots?.controls ?? null, extras: this.roots?.extras ?? null },
      modules: this.moduleList.map((module) => module.toRecord())
    };
    for (const module of this.moduleList) {
      module.markPersisted();
    }
    return document;
  }

  private modulesNamed(name: string): RigModule[] {
    return this.moduleList.filter((module) => module.name.get() === name);
  }

  private assertUniqueNodeName(nodeName: string): void {
    if (this.moduleList.some((module) => module.nodeName === nodeName)) {
      throw new ValidationError('name', RIG_MODULE_EXISTS(nodeName), [], { fix: RIG_MODULE_EXISTS_FIX });
    }
  }
}
