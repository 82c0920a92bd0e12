import {
  ConfigError,
  PromotionRejectedError,
  RegistryConflictError,
  VersionInUseError,
} from '../types/ModelGateErrors';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CONFIG_ERROR = 2;
export const EXIT_GATE_FAILED = 3;
export const EXIT_REGISTRY_CONFLICT = 4;
export const EXIT_VERSION_IN_USE = 5;

export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError) return EXIT_CONFIG_ERROR;
  if (error instanceof PromotionRejectedError) return EXIT_GATE_FAILED;
  if (error instanceof RegistryConflictError) return EXIT_REGISTRY_CONFLICT;
  if (error instanceof VersionInUseError) return EXIT_VERSION_IN_USE;
  return EXIT_FAILURE;
}
