import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { errorMessage, PersistenceError } from "../errors";
import type { ProfileRecord } from "../profile/schema";

export const DEFAULT_PROFILE_DIR = "profiles";
export const DEFAULT_PROFILE_FILE = "user_profile.json";

export interface ProfileStore {
  save(record: ProfileRecord, filename?: string): Promise<string>;
}

/** Writes the finished profile as indented JSON, replacing any earlier file. */
export class RecordStore implements ProfileStore {
  constructor(
    private readonly directory = path.resolve(process.cwd(), DEFAULT_PROFILE_DIR)
  ) {}

  async save(record: ProfileRecord, filename = DEFAULT_PROFILE_FILE) {
    const filePath = path.join(this.directory, filename);
    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(filePath, JSON.stringify(record, null, 2), "utf8");
    } catch (error) {
      throw new PersistenceError(
        `Could not save profile to ${filePath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
    return filePath;
  }
}
