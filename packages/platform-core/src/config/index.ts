export * from './environment-config';
