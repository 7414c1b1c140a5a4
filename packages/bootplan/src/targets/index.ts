export * from './types';
export { dexpreoptTargets, targetName } from './resolve';
