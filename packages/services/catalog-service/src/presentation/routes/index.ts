export * from './catalogRoutes';
export * from './downloadRoutes';
export * from './radioRoutes';
export * from './healthRoutes';
