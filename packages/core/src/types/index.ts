export * from './store';
export * from './proximity';
export * from './weather';
export * from './trend';
export * from './insight';
export * from './config';
