export * from './types';
export {
  ART_BOOT_IMAGE_NAME,
  FRAMEWORK_BOOT_IMAGE_NAME,
  artBootImageConfig,
  defaultBootImageConfig,
  deviceOutDir,
  genBootImageConfigs,
  getAnyAndroidVariant,
} from './configs';
export { getUpdatableBootConfig } from './updatable';
export {
  IMAGE_EXTENSIONS,
  expandVariants,
  firstModuleNameOrStem,
  moduleFiles,
  moduleName,
} from './variants';
