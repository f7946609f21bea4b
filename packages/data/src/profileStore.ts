import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { cloneProfile, createLogger } from "@practice/core";
import type { LearnerProfile } from "@practice/core";
import { decodeProfile, encodeProfile } from "./profileCodec";

export interface ProfileStore {
  load(learnerId: string): Promise<LearnerProfile | undefined>;
  save(profile: LearnerProfile): Promise<void>;
}

const log = createLogger("profile-store");

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

export class InMemoryProfileStore implements ProfileStore {
  private readonly profiles = new Map<string, string>();

  public async load(learnerId: string): Promise<LearnerProfile | undefined> {
    const encoded = this.profiles.get(learnerId);
    return encoded === undefined ? undefined : decodeProfile(encoded);
  }

  public async save(profile: LearnerProfile): Promise<void> {
    this.profiles.set(profile.learnerId, encodeProfile(cloneProfile(profile)));
  }
}

/** One JSON file per learner under `directory`, replaced atomically on save. */
export class FileProfileStore implements ProfileStore {
  private readonly directory: string;

  constructor(directory: string) {
    this.directory = directory;
  }

  public fileFor(learnerId: string): string {
    return path.join(this.directory, `${encodeURIComponent(learnerId)}.json`);
  }

  public async load(learnerId: string): Promise<LearnerProfile | undefined> {
    let text: string;
    try {
      text = await readFile(this.fileFor(learnerId), "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw error;
    }
    return decodeProfile(text);
  }

  public async save(profile: LearnerProfile): Promise<void> {
    const target = this.fileFor(profile.learnerId);
    const temporary = `${target}.${process.pid}.${Date.now()}.tmp`;

    await mkdir(this.directory, { recursive: true });
    await writeFile(temporary, encodeProfile(profile), "utf8");
    await rename(temporary, target);
    log.debug("Profile saved", { learner: profile.learnerId, file: target });
  }
}
