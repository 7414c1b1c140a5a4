export { bcpForDexpreopt } from './bootclasspath';
export {
  SYSTEM_FRAMEWORK_DIR,
  nonUpdatableSystemServerJars,
  systemServerClasspath,
} from './system-server';
