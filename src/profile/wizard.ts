import { errorMessage, OperatorInterruptError } from "../errors";
import { summaryLines } from "../helper/helper";
import type { Acquirer, InputMode } from "../input/acquirer";
import { isYes } from "../input/console";
import type { Prompter } from "../input/console";
import type { ProfileStore } from "../storage/recordStore";
import { PROFILE_QUESTIONS } from "./questions";
import { profileRecordSchema } from "./schema";
import type { ProfileRecord } from "./schema";
import { emptyProfile } from "./types";
import type { ProfileDraft, QuestionDefinition } from "./types";
import { validate } from "./validate";

const RULE = "=".repeat(50);

export type WizardDeps = {
  prompter: Prompter;
  store: ProfileStore;
  acquirerFor: (mode: InputMode) => Acquirer;
  questions?: readonly QuestionDefinition[];
  now?: () => Date;
};

export type WizardResult = {
  record: ProfileRecord;
  path: string;
};

/**
 * Walks the questionnaire once. A question is asked until its answer
 * validates; only then does the index move on. Nothing is written until
 * every question has an answer.
 */
export class ProfileWizard {
  private readonly draft: ProfileDraft = emptyProfile();
  private readonly questions: readonly QuestionDefinition[];
  private index = 0;

  constructor(private readonly deps: WizardDeps) {
    this.questions = deps.questions ?? PROFILE_QUESTIONS;
  }

  get profile(): Readonly<ProfileDraft> {
    return this.draft;
  }

  get questionIndex(): number {
    return this.index;
  }

  get done(): boolean {
    return this.index >= this.questions.length;
  }

  async run(): Promise<WizardResult> {
    const { prompter } = this.deps;
    prompter.say("\nProfile Creation Wizard");
    prompter.say(RULE);

    const mode: InputMode = isYes(
      await prompter.ask("\nUse voice input? (y/n): ")
    )
      ? "voice"
      : "text";
    const acquirer = this.deps.acquirerFor(mode);

    while (!this.done) {
      await this.askCurrent(acquirer);
    }

    const record = this.finalize();
    const path = await this.deps.store.save(record);
    prompter.say(`\nProfile saved to ${path}`);
    this.display(record);
    return { record, path };
  }

  private async askCurrent(acquirer: Acquirer): Promise<void> {
    const question = this.questions[this.index];
    try {
      const answer = await acquirer.acquire(question.prompt);
      if (!validate(question.kind, answer)) {
        this.deps.prompter.warn(
          `Invalid ${question.field} format. Please try again.`
        );
        return;
      }
      this.accept(question, answer);
      this.index += 1;
    } catch (error) {
      if (error instanceof OperatorInterruptError) throw error;
      this.deps.prompter.warn(
        `Error: ${errorMessage(error)}. Please try again.`
      );
    }
  }

  private accept(question: QuestionDefinition, answer: string): void {
    switch (question.kind) {
      case "list":
        this.draft[question.field] = answer.split(",").map((s) => s.trim());
        break;
      case "number":
        this.draft[question.field] = Number.parseInt(answer.trim(), 10);
        break;
      default:
        this.draft[question.field] = answer.trim();
    }
  }

  private finalize(): ProfileRecord {
    const now = this.deps.now ?? (() => new Date());
    this.draft.created_at = now().toISOString();
    return profileRecordSchema.parse(this.draft);
  }

  private display(record: ProfileRecord): void {
    const { prompter } = this.deps;
    prompter.say("\nProfile Summary:");
    prompter.say(RULE);
    for (const line of summaryLines(record)) prompter.say(line);
    prompter.say(RULE);
  }
}
