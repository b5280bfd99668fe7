import { mkdtemp, readFile, rm, writeFile, mkdir } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { OperatorInterruptError, PersistenceError } from "../src/errors";
import { InputAcquirer } from "../src/input/acquirer";
import type { InputMode } from "../src/input/acquirer";
import { PROFILE_QUESTIONS } from "../src/profile/questions";
import { ProfileWizard } from "../src/profile/wizard";
import { RecordStore } from "../src/storage/recordStore";
import type { ProfileStore } from "../src/storage/recordStore";
import {
  MemoryStore,
  ScriptedAcquirer,
  ScriptedPrompter,
} from "./support/fakes";

const JANE = [
  "Jane Doe",
  "29",
  "jane@x.com",
  "5551234567",
  "Engineer",
  "python, go",
  "BSc",
  "NYC",
];

const FIXED_NOW = () => new Date("2026-03-01T09:30:00.000Z");

describe("ProfileWizard", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "profile-wizard-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("runs a typed session end to end and replaces the previous file", async () => {
    const profilesDir = path.join(dir, "profiles");
    await mkdir(profilesDir);
    await writeFile(
      path.join(profilesDir, "user_profile.json"),
      JSON.stringify({ stale: true })
    );

    const prompter = new ScriptedPrompter(["n", ...JANE]);
    const modes: InputMode[] = [];
    const wizard = new ProfileWizard({
      prompter,
      store: new RecordStore(profilesDir),
      acquirerFor: (mode) => {
        modes.push(mode);
        return new InputAcquirer(prompter);
      },
    });

    const result = await wizard.run();

    expect(modes).toEqual(["text"]);
    expect(result.path).toBe(path.join(profilesDir, "user_profile.json"));
    expect(prompter.asked).toEqual([
      "\nUse voice input? (y/n): ",
      ...PROFILE_QUESTIONS.map((q) => `\n${q.prompt}\n> `),
    ]);

    const saved = JSON.parse(await readFile(result.path, "utf8"));
    expect(Object.keys(saved)).toEqual([
      "name",
      "age",
      "email",
      "phone",
      "occupation",
      "skills",
      "education",
      "location",
      "created_at",
    ]);
    expect(saved).toMatchObject({
      name: "Jane Doe",
      age: 29,
      email: "jane@x.com",
      phone: "5551234567",
      occupation: "Engineer",
      skills: ["python", "go"],
      education: "BSc",
      location: "NYC",
    });
    expect(saved.stale).toBeUndefined();
    expect(typeof saved.created_at).toBe("string");
    expect(saved.created_at.length).toBeGreaterThan(0);
    expect(wizard.done).toBe(true);
  });

  it("asks for the input mode once and passes it on", async () => {
    const prompter = new ScriptedPrompter(["Yes"]);
    const modes: InputMode[] = [];
    const wizard = new ProfileWizard({
      prompter,
      store: new MemoryStore(),
      acquirerFor: (mode) => {
        modes.push(mode);
        return new ScriptedAcquirer([...JANE], mode);
      },
    });

    await wizard.run();
    expect(modes).toEqual(["voice"]);
  });

  it("stamps created_at, saves once and prints the summary", async () => {
    const prompter = new ScriptedPrompter(["n"]);
    const store = new MemoryStore();
    const wizard = new ProfileWizard({
      prompter,
      store,
      acquirerFor: () => new ScriptedAcquirer([...JANE]),
      now: FIXED_NOW,
    });

    const { record } = await wizard.run();

    expect(store.saved).toEqual([record]);
    expect(record.created_at).toBe("2026-03-01T09:30:00.000Z");
    expect(prompter.said.slice(-12)).toEqual([
      "\nProfile saved to memory/user_profile.json",
      "\nProfile Summary:",
      "=".repeat(50),
      "Name: Jane Doe",
      "Age: 29",
      "Email: jane@x.com",
      "Phone: 5551234567",
      "Occupation: Engineer",
      "Skills: python, go",
      "Education: BSc",
      "Location: NYC",
      "=".repeat(50),
    ]);
  });

  it("keeps asking the same question until the answer validates", async () => {
    const prompter = new ScriptedPrompter(["n"]);
    const seen: Array<{ index: number; age: number | null }> = [];
    let wizard: ProfileWizard | undefined;
    const acquirer = new ScriptedAcquirer(
      ["Jane Doe", "abc", "150", "", "29", ...JANE.slice(2)],
      "text",
      (prompt) => {
        if (wizard && prompt === "What is your age?") {
          seen.push({ index: wizard.questionIndex, age: wizard.profile.age });
        }
      }
    );
    wizard = new ProfileWizard({
      prompter,
      store: new MemoryStore(),
      acquirerFor: () => acquirer,
    });

    const { record } = await wizard.run();

    expect(seen).toEqual([
      { index: 1, age: null },
      { index: 1, age: null },
      { index: 1, age: null },
      { index: 1, age: null },
    ]);
    expect(prompter.warnings).toEqual([
      "Invalid age format. Please try again.",
      "Invalid age format. Please try again.",
      "Invalid age format. Please try again.",
    ]);
    expect(record.age).toBe(29);
  });

  it("reports unexpected failures and retries the question", async () => {
    const prompter = new ScriptedPrompter(["n"]);
    const wizard = new ProfileWizard({
      prompter,
      store: new MemoryStore(),
      acquirerFor: () =>
        new ScriptedAcquirer([new Error("microphone glitch"), ...JANE]),
    });

    const { record } = await wizard.run();

    expect(prompter.warnings).toEqual([
      "Error: microphone glitch. Please try again.",
    ]);
    expect(record.name).toBe("Jane Doe");
  });

  it("stops without saving when interrupted", async () => {
    const store = new MemoryStore();
    const wizard = new ProfileWizard({
      prompter: new ScriptedPrompter(["n"]),
      store,
      acquirerFor: () =>
        new ScriptedAcquirer(["Jane Doe", new OperatorInterruptError()]),
    });

    await expect(wizard.run()).rejects.toBeInstanceOf(OperatorInterruptError);
    expect(store.saved).toEqual([]);
    expect(wizard.profile.name).toBe("Jane Doe");
    expect(wizard.profile.created_at).toBeNull();
  });

  it("surfaces persistence failures", async () => {
    const failing: ProfileStore = {
      save: async () => {
        throw new PersistenceError("disk full");
      },
    };
    const prompter = new ScriptedPrompter(["n"]);
    const wizard = new ProfileWizard({
      prompter,
      store: failing,
      acquirerFor: () => new ScriptedAcquirer([...JANE]),
    });

    await expect(wizard.run()).rejects.toBeInstanceOf(PersistenceError);
    expect(prompter.said).not.toContain("\nProfile Summary:");
  });

  it("stores list answers as trimmed items and numbers as integers", async () => {
    const answers = [...JANE];
    answers[1] = "007";
    answers[5] = " rust ,  go,c ";
    const wizard = new ProfileWizard({
      prompter: new ScriptedPrompter(["n"]),
      store: new MemoryStore(),
      acquirerFor: () => new ScriptedAcquirer(answers),
    });

    const { record } = await wizard.run();

    expect(record.age).toBe(7);
    expect(record.skills).toEqual(["rust", "go", "c"]);
  });
});
