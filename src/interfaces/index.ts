export * from './provisioner';
export * from './remote-ssh';
export * from './secrets';
