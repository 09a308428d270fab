export * from './messages/fields';
export * from './messages/modules';
export * from './messages/rig';
