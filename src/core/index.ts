// Organizer core module
export * from './constants';
export * from './errors';
export * from './logger';
export * from './organizer-types';
export * from './config-manager';
export * from './environment-config';
export * from './error-handler';
export * from './organization-result';
export * from './organization-engine';
export * from './organizer-factory';
