import type { ManifestDefinition, RequirementMap, RequirementSection } from '../../types/index.js';
import { MANIFEST_INDENT, REQUIREMENT_SECTIONS } from '../../constants/index.js';
import { readTextFile, writeTextFile } from '../../utils/fs.js';
import { isRecord, parseStrictJson } from '../../utils/json.js';
import { ManifestError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

function isRequirementMap(value: unknown): value is RequirementMap {
  return isRecord(value) && Object.values(value).every(constraint => typeof constraint === 'string');
}

function isManifestDefinition(value: unknown): value is ManifestDefinition {
  if (!isRecord(value)) {
    return false;
  }
  const sectionsValid = REQUIREMENT_SECTIONS.every(
    section => value[section] === undefined || isRequirementMap(value[section])
  );
  return sectionsValid && (value.config === undefined || isRecord(value.config));
}

/**
 * The root manifest on disk. Read and written as a whole document; keys the
 * rewriter doesn't know about survive a round trip in their original order.
 */
export class ComposerJsonFile {
  constructor(private readonly path: string) {}

  getPath(): string {
    return this.path;
  }

  async read(): Promise<ManifestDefinition> {
    const { value, errors } = parseStrictJson(await readTextFile(this.path));
    if (errors.length > 0) {
      throw new ManifestError(this.path, errors.join('; '), { errors });
    }
    if (!isManifestDefinition(value)) {
      throw new ManifestError(
        this.path,
        'expected an object whose "require" and "require-dev" map package names to constraint strings'
      );
    }
    return value;
  }

  async write(definition: ManifestDefinition): Promise<void> {
    await writeTextFile(this.path, `${JSON.stringify(definition, null, MANIFEST_INDENT)}\n`);
    logger.debug(`Updated manifest ${this.path}`);
  }
}

/**
 * Whether the package is declared directly in require or require-dev
 */
export function isRootRequirement(definition: ManifestDefinition, packageName: string): boolean {
  return REQUIREMENT_SECTIONS.some(section => hasRequirement(definition[section], packageName));
}

function hasRequirement(requirements: RequirementMap | undefined, packageName: string): boolean {
  return requirements !== undefined && Object.prototype.hasOwnProperty.call(requirements, packageName);
}

/**
 * Rename a root requirement, keeping its constraint and its section.
 * A replacement that is already declared keeps its position and takes the
 * deprecated package's constraint. With config.sort-packages the touched
 * section is re-sorted by name.
 */
export function updateRootRequirements(
  definition: ManifestDefinition,
  packageName: string,
  replacementName: string
): ManifestDefinition {
  const sortPackages = definition.config?.['sort-packages'] === true;
  const updated: ManifestDefinition = { ...definition };

  for (const section of REQUIREMENT_SECTIONS) {
    const requirements = definition[section];
    if (requirements === undefined || !hasRequirement(requirements, packageName)) {
      continue;
    }
    updated[section] = renameRequirement(requirements, packageName, replacementName, sortPackages);
  }

  return updated;
}

function renameRequirement(
  requirements: RequirementMap,
  packageName: string,
  replacementName: string,
  sortPackages: boolean
): RequirementMap {
  const constraint = requirements[packageName];
  const renamed: RequirementMap = {};

  for (const [name, value] of Object.entries(requirements)) {
    if (name !== packageName) {
      renamed[name] = value;
    }
  }
  renamed[replacementName] = constraint;

  if (!sortPackages) {
    return renamed;
  }

  const sorted: RequirementMap = {};
  for (const name of Object.keys(renamed).sort()) {
    sorted[name] = renamed[name];
  }
  return sorted;
}

export function requirementSectionsOf(definition: ManifestDefinition, packageName: string): RequirementSection[] {
  return REQUIREMENT_SECTIONS.filter(section => hasRequirement(definition[section], packageName));
}
