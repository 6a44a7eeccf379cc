export * from './events';
export * from './session';
export * from './transport';
export * from './config';
