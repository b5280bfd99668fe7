export type FieldKind = "text" | "number" | "email" | "phone" | "list";

type TextField =
  | "name"
  | "email"
  | "phone"
  | "occupation"
  | "education"
  | "location";

export type QuestionDefinition =
  | { field: "age"; prompt: string; kind: "number" }
  | { field: "skills"; prompt: string; kind: "list" }
  | { field: TextField; prompt: string; kind: "text" | "email" | "phone" };

// In-progress profile; a field stays null (skills empty) until its answer validates.
export type ProfileDraft = {
  name: string | null;
  age: number | null;
  email: string | null;
  phone: string | null;
  occupation: string | null;
  skills: string[];
  education: string | null;
  location: string | null;
  created_at: string | null;
};

export function emptyProfile(): ProfileDraft {
  return {
    name: null,
    age: null,
    email: null,
    phone: null,
    occupation: null,
    skills: [],
    education: null,
    location: null,
    created_at: null,
  };
}
