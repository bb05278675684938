export * from './config';
export * from './remote-ssh';
export * from './task';
