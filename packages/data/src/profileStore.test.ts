import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ProfileFormatError } from "@practice/core";
import type { LearnerProfile } from "@practice/core";
import { FileProfileStore, InMemoryProfileStore } from "./profileStore";

const makeProfile = (learnerId: string): LearnerProfile => ({
  learnerId,
  abilities: { recursion: 0.5 },
  conceptStatus: { recursion: "opened" },
  history: []
});

describe("InMemoryProfileStore", () => {
  it("returns copies of saved profiles", async () => {
    const store = new InMemoryProfileStore();
    const profile = makeProfile("learner-1");
    await store.save(profile);
    profile.abilities.recursion = 3;

    const loaded = await store.load("learner-1");
    expect(loaded?.abilities.recursion).toBe(0.5);
    expect(await store.load("nobody")).toBeUndefined();
  });
});

describe("FileProfileStore", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), "profile-store-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("writes one file per learner and reads it back", async () => {
    const store = new FileProfileStore(path.join(directory, "profiles"));
    await store.save(makeProfile("team/alice"));

    expect(await readdir(path.join(directory, "profiles"))).toEqual(["team%2Falice.json"]);
    expect(await store.load("team/alice")).toEqual(makeProfile("team/alice"));
  });

  it("overwrites an earlier save", async () => {
    const store = new FileProfileStore(directory);
    await store.save(makeProfile("learner-1"));
    await store.save({ ...makeProfile("learner-1"), abilities: { recursion: 1.4 } });

    expect((await store.load("learner-1"))?.abilities).toEqual({ recursion: 1.4 });
  });

  it("returns undefined for a learner without a file", async () => {
    await expect(new FileProfileStore(directory).load("learner-2")).resolves.toBeUndefined();
  });

  it("refuses a corrupt file", async () => {
    const store = new FileProfileStore(directory);
    await writeFile(store.fileFor("learner-3"), "not json", "utf8");
    await expect(store.load("learner-3")).rejects.toThrow(ProfileFormatError);
  });
});
