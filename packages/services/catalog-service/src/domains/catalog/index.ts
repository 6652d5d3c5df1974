export * from './entities/Song';
export * from './entities/Album';
export * from './value-objects/LoadingProgress';
export * from './value-objects/CatalogPath';
