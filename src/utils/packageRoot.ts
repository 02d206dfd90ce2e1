import path from 'path';
import fs from 'fs';

export const PACKAGE_NAME = 'telemetry-orchestrator';

function readPackageName(dir: string): string | undefined {
  try {
    const packageJsonPath = path.join(dir, 'package.json');
    if (!fs.existsSync(packageJsonPath)) {
      return undefined;
    }
    const parsed: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'));
    if (typeof parsed === 'object' && parsed !== null && 'name' in parsed && typeof parsed.name === 'string') {
      return parsed.name;
    }
  } catch {
    // Malformed package.json, keep walking
  }
  return undefined;
}

/**
 * Finds the package root by walking up from this file until a package.json
 * with our package name is found. Works from src/ under ts-jest and from dist/
 * once compiled.
 */
export function findPackageRoot(): string {
  let currentDir = __dirname;
  let attempts = 0;
  const maxAttempts = 50;

  while (currentDir !== path.dirname(currentDir) && attempts < maxAttempts) {
    if (readPackageName(currentDir) === PACKAGE_NAME) {
      return currentDir;
    }
    currentDir = path.dirname(currentDir);
    attempts++;
  }

  throw new Error(
    `Could not find ${PACKAGE_NAME} package root. Searched from ${__dirname} upward ` +
    `(${attempts} directories).`
  );
}

let cachedPackageRoot: string | undefined;

export function getPackageRoot(): string {
  if (!cachedPackageRoot) {
    cachedPackageRoot = findPackageRoot();
  }
  return cachedPackageRoot;
}

/**
 * Helper to resolve paths relative to the package root
 */
export function resolvePackagePath(...pathSegments: string[]): string {
  return path.resolve(getPackageRoot(), ...pathSegments);
}
