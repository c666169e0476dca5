import { MissingDependencyError } from "../../core/errors";

export type ModuleResolver = (id: string) => string;

/**
 * Capability check for optional SDKs: true when `name` resolves from this package.
 * Nothing is loaded, only resolved.
 */
export const hasDependency = (name: string, resolve: ModuleResolver = require.resolve): boolean => {
  try {
    resolve(name);
    return true;
  } catch {
    return false;
  }
};

export const assertDependencies = (
  names: readonly string[],
  context: { connector?: string } = {},
  resolve: ModuleResolver = require.resolve
): void => {
  const missing = names.filter((name) => !hasDependency(name, resolve));
  if (missing.length > 0) {
    throw new MissingDependencyError(missing, context);
  }
};
