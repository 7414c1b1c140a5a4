export {
  ConfiguredJarList,
  PLATFORM_APEX,
  moduleStem,
  splitApexJarPair,
} from './configured-jar-list';
export type { ApexJarPair, HostPathsConfig } from './configured-jar-list';
