export { PopularityQuery } from './popularity-query';
export type { PopularityQueryDependencies } from './popularity-query';
