import { randomBytes, randomInt } from 'crypto';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { FileRecord } from '../models/file-record.model';
import { splitFilename } from '../utils/filename.utils';

export enum CollisionStrategy {
  INCREMENT = 'increment', // photo_1.jpg, photo_2.jpg
  UUID = 'uuid', // photo_3f9a7b8c.jpg
  TIMESTAMP = 'timestamp', // photo_1700000000.jpg
}

export interface CollisionContext {
  /**
   * Extension (with dot) that will be appended to the returned base name
   */
  extension: string;
  isAvailable: (baseName: string) => boolean;
}

/**
 * Custom strategy: receives the base name without extension and returns a
 * unique base name
 */
export type CustomCollisionStrategy = (
  baseName: string,
  context: CollisionContext,
) => string;

export interface ResolveCollisionOptions {
  /**
   * Names already taken in the current batch
   */
  usedFilenames?: Iterable<string>;
  /**
   * Existence check against the storage the caller owns
   */
  exists?: (filename: string) => boolean;
  strategy?: CollisionStrategy | CustomCollisionStrategy;
}

const MAX_INCREMENT_ATTEMPTS = 1000;
const MAX_UUID_ATTEMPTS = 100;
const MAX_TIMESTAMP_ATTEMPTS = 1000;

const COLLISION_STRATEGIES: readonly string[] = Object.values(CollisionStrategy);

function isCollisionStrategy(value: string): value is CollisionStrategy {
  return COLLISION_STRATEGIES.includes(value);
}

function randomSuffix(): string {
  return randomBytes(8).toString('hex');
}

@Injectable()
export class CollisionResolverService {
  private readonly logger = new Logger(CollisionResolverService.name);
  private readonly defaultStrategy: CollisionStrategy;

  constructor(private readonly configService: ConfigService) {
    const configured = this.configService
      .get<string>('UPLOAD_COLLISION_STRATEGY', CollisionStrategy.INCREMENT)
      .toLowerCase();

    if (isCollisionStrategy(configured)) {
      this.defaultStrategy = configured;
    } else {
      this.logger.warn(
        `Unknown collision strategy: ${configured}. Falling back to increment.`,
      );
      this.defaultStrategy = CollisionStrategy.INCREMENT;
    }
  }

  /**
   * Return `filename` when it is free, otherwise a variant with a unique
   * suffix before the extension
   */
  generateUniqueFilename(
    filename: string,
    options: ResolveCollisionOptions = {},
  ): string {
    const used = new Set(options.usedFilenames ?? []);
    const exists = options.exists ?? (() => false);
    const isTaken = (candidate: string) =>
      used.has(candidate) || exists(candidate);

    if (!isTaken(filename)) {
      return filename;
    }

    const { baseName, extension } = splitFilename(filename);
    const isAvailable = (candidateBase: string) =>
      !isTaken(candidateBase + extension);
    const strategy = options.strategy ?? this.defaultStrategy;

    const uniqueBase =
      typeof strategy === 'function'
        ? strategy(baseName, { extension, isAvailable })
        : this.resolveWithStrategy(strategy, baseName, isAvailable);

    const unique = uniqueBase + extension;
    this.logger.debug(`Resolved filename collision: ${filename} -> ${unique}`);
    return unique;
  }

  /**
   * Resolve a batch; each result is reserved for the following names
   */
  generateUniqueFilenames(
    filenames: readonly string[],
    options: ResolveCollisionOptions = {},
  ): string[] {
    const used = new Set(options.usedFilenames ?? []);

    return filenames.map((filename) => {
      const unique = this.generateUniqueFilename(filename, {
        ...options,
        usedFilenames: used,
      });
      used.add(unique);
      return unique;
    });
  }

  resolveRecord(
    record: FileRecord,
    options: ResolveCollisionOptions = {},
  ): FileRecord {
    const unique = this.generateUniqueFilename(record.filename, options);
    return unique === record.filename ? record : record.withFilename(unique);
  }

  private resolveWithStrategy(
    strategy: CollisionStrategy,
    baseName: string,
    isAvailable: (baseName: string) => boolean,
  ): string {
    switch (strategy) {
      case CollisionStrategy.UUID:
        return this.resolveWithUuid(baseName, isAvailable);
      case CollisionStrategy.TIMESTAMP:
        return this.resolveWithTimestamp(baseName, isAvailable);
      case CollisionStrategy.INCREMENT:
        return this.resolveWithIncrement(baseName, isAvailable);
    }
  }

  private resolveWithIncrement(
    baseName: string,
    isAvailable: (baseName: string) => boolean,
  ): string {
    for (let counter = 1; counter < MAX_INCREMENT_ATTEMPTS; counter++) {
      const candidate = `${baseName}_${counter}`;
      if (isAvailable(candidate)) {
        return candidate;
      }
    }

    return `${baseName}_${randomSuffix()}`;
  }

  private resolveWithUuid(
    baseName: string,
    isAvailable: (baseName: string) => boolean,
  ): string {
    for (let attempt = 0; attempt < MAX_UUID_ATTEMPTS; attempt++) {
      const candidate = `${baseName}_${uuidv4().replace(/-/g, '').slice(0, 8)}`;
      if (isAvailable(candidate)) {
        return candidate;
      }
    }

    return `${baseName}_${randomSuffix()}`;
  }

  private resolveWithTimestamp(
    baseName: string,
    isAvailable: (baseName: string) => boolean,
  ): string {
    const seconds = Math.floor(Date.now() / 1000);

    for (let attempt = 0; attempt < MAX_TIMESTAMP_ATTEMPTS; attempt++) {
      const candidate =
        attempt === 0
          ? `${baseName}_${seconds}`
          : `${baseName}_${seconds}_${attempt}`;
      if (isAvailable(candidate)) {
        return candidate;
      }
    }

    return `${baseName}_${seconds}_${randomInt(1000, 10000)}`;
  }
}
