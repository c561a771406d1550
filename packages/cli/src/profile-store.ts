/**
 * Profile store
 *
 * The whole collection lives in one JSON file and is rewritten on every save.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import {
  ConfigurationError,
  type Profile,
  type ProfileCollection,
  type StoredProfile,
  fromStoredProfile,
  logger,
  validateProfileCollection,
  validateStoredProfile,
} from "@csv-trim/core";

/**
 * Error thrown when the store file cannot be read or holds invalid profiles
 */
export class ProfileStoreError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly originalError?: Error
  ) {
    super(message);
    this.name = "ProfileStoreError";
  }
}

export class ProfileStore {
  private constructor(
    readonly filePath: string,
    private profiles: ProfileCollection
  ) {}

  /**
   * Load the store; a missing file is an empty collection
   */
  static load(filePath: string): ProfileStore {
    if (!existsSync(filePath)) {
      logger.debug({ filePath }, "No profile store yet");
      return new ProfileStore(filePath, {});
    }

    let content: string;
    try {
      content = readFileSync(filePath, "utf-8");
    } catch (error) {
      throw new ProfileStoreError(
        `Failed to read profile store: ${(error as Error).message}`,
        filePath,
        error as Error
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new ProfileStoreError(
        `Profile store is not valid JSON: ${(error as Error).message}`,
        filePath,
        error as Error
      );
    }

    try {
      return new ProfileStore(filePath, validateProfileCollection(parsed));
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw new ProfileStoreError(`${error.message}\n(in ${filePath})`, filePath, error);
      }
      throw error;
    }
  }

  get size(): number {
    return Object.keys(this.profiles).length;
  }

  /**
   * Profile names in display order
   */
  get names(): string[] {
    return Object.keys(this.profiles);
  }

  has(name: string): boolean {
    return Object.hasOwn(this.profiles, name);
  }

  get(name: string): StoredProfile | undefined {
    return this.has(name) ? this.profiles[name] : undefined;
  }

  /**
   * Engine form of a stored profile
   */
  getProfile(name: string): Profile | undefined {
    const stored = this.get(name);
    return stored ? fromStoredProfile(stored) : undefined;
  }

  /**
   * Add a profile, or replace an existing one wholesale
   */
  set(name: string, profile: StoredProfile): void {
    this.profiles = { ...this.profiles, [name]: validateStoredProfile(profile, name) };
  }

  remove(name: string): boolean {
    if (!this.has(name)) return false;
    const { [name]: _removed, ...rest } = this.profiles;
    this.profiles = rest;
    return true;
  }

  /**
   * First free name of the form `Profile<n>`, starting after the current count
   */
  nextProfileName(): string {
    let counter = this.size + 1;
    while (this.has(`Profile${counter}`)) {
      counter++;
    }
    return `Profile${counter}`;
  }

  save(): void {
    mkdirSync(dirname(this.filePath), { recursive: true });
    writeFileSync(this.filePath, JSON.stringify(this.profiles, null, 4), "utf-8");
    logger.debug({ filePath: this.filePath, count: this.size }, "Saved profile store");
  }

  toJSON(): ProfileCollection {
    return { ...this.profiles };
  }
}
