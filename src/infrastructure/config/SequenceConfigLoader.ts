import * as fs from 'fs/promises';
import * as yaml from 'yaml';
import { z } from 'zod';
import { SequenceConfig } from '../../types';
import { ILogger } from '../../domain/common/ILogger';
import { ConfigError } from '../../domain/common/Errors';
import { parseSequenceConfig } from '../../domain/sequence/SequenceConfig';

const collectionIdSchema = z.string().regex(/^[a-zA-Z0-9_-]+$/, 'Collection ID must be alphanumeric with hyphens/underscores only');

const sequenceFileSchema = z.object({
  collections: z.record(collectionIdSchema, z.unknown()).default({}),
}).strict();

function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/**
 * Loads per-collection sequence settings from a YAML file:
 *
 *   collections:
 *     items: position          # order field only
 *     cards:
 *       orderField: position
 *       groupFields: [boardId, column]
 *       startAt: 1
 */
export class SequenceConfigLoader {
  constructor(
    private filePath: string,
    private logger: ILogger
  ) {}

  /**
   * A missing file means no sequenced collections.
   * @throws {ConfigError} if the file cannot be parsed or a collection's settings are invalid
   */
  async load(): Promise<Map<string, SequenceConfig>> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) {
        this.logger.info(`No sequence config at ${this.filePath}`);
        return new Map();
      }
      throw err;
    }

    return this.parse(content);
  }

  parse(content: string): Map<string, SequenceConfig> {
    let raw: unknown;
    try {
      raw = yaml.parse(content);
    } catch (err) {
      throw new ConfigError(`Failed to parse ${this.filePath}: ${err instanceof Error ? err.message : String(err)}`);
    }

    const parsed = sequenceFileSchema.safeParse(raw ?? {});
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigError(`Invalid sequence config in ${this.filePath}`, issues);
    }

    const configs = new Map<string, SequenceConfig>();
    for (const [collectionId, input] of Object.entries(parsed.data.collections)) {
      try {
        configs.set(collectionId, parseSequenceConfig(input ?? {}));
      } catch (err) {
        if (err instanceof ConfigError) {
          throw new ConfigError(`Collection '${collectionId}': ${err.message}`, err.details);
        }
        throw err;
      }
    }

    this.logger.info(`Loaded sequence config for ${configs.size} collection(s)`);
    return configs;
  }
}
