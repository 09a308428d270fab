import 'reflect-metadata';

export * from './config';
export * from './logging';
export * from './shared/errors';
export * from './shared/result';
export * from './types/scene';
export type { SceneGraphPort } from './ports/sceneGraph';
export * from './domain/naming';
export * from './domain/transform';
export * from './domain/dag';
export * from './domain/buildOrder';
export * from './fields/fieldTypes';
export * from './fields/fieldDecorators';
export { getFieldDescriptors } from './fields/fieldRegistry';
export { FieldStore } from './fields/FieldStore';
export * from './graph/NodeGraphPlan';
export * from './graph/replayPlan';
export * from './modules/types';
export * from './modules/RigModule';
export * from './modules/RigModuleFields';
export * from './modules/ChainModule';
export * from './modules/CorrectiveModule';
export * from './modules/corrective/angleReader';
export * from './modules/corrective/offsetWiring';
export * from './modules/moduleRegistry';
export * from './rig/JointRegistry';
export * from './rig/rigDocument';
export * from './rig/Rig';
