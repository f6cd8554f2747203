export * from './installer';
export * from './remote-ssh';
export * from './script';
