import type { QuestionDefinition } from "./types";

export const PROFILE_QUESTIONS: readonly QuestionDefinition[] = [
  { field: "name", prompt: "What is your full name?", kind: "text" },
  { field: "age", prompt: "What is your age?", kind: "number" },
  { field: "email", prompt: "What is your email address?", kind: "email" },
  { field: "phone", prompt: "What is your phone number?", kind: "phone" },
  {
    field: "occupation",
    prompt: "What is your current occupation?",
    kind: "text",
  },
  {
    field: "skills",
    prompt: "What are your skills? (separate with and)",
    kind: "list",
  },
  {
    field: "education",
    prompt: "What is your highest education level?",
    kind: "text",
  },
  { field: "location", prompt: "Where are you located?", kind: "text" },
];
