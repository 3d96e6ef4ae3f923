/**
 * Named-placeholder prompt templates.
 *
 * Placeholders are written `{{name}}` (whitespace inside the braces is
 * ignored). Rendering is pure: it never reads configuration or touches I/O.
 */
import { MissingTemplateVariableError } from "@domain/errors";

export interface TemplateVariable {
  name: string;
  required: boolean;
}

export interface PromptTemplate {
  template: string;
  variables: readonly TemplateVariable[];
}

export type TemplateValues = Readonly<Record<string, string | undefined>>;

const PLACEHOLDER = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;

export function placeholdersOf(template: string): string[] {
  const names = new Set<string>();
  for (const match of template.matchAll(PLACEHOLDER)) {
    if (match[1]) {
      names.add(match[1]);
    }
  }
  return [...names];
}

/**
 * Substitutes every placeholder of `prompt.template`.
 *
 * Required variables and placeholders the template does not declare must have
 * a value; optional declared variables default to "". Every missing name is
 * reported at once.
 */
export function renderPrompt(
  prompt: PromptTemplate,
  values: TemplateValues
): string {
  const declared = new Map(prompt.variables.map((v) => [v.name, v]));
  const missing = new Set<string>();

  for (const variable of prompt.variables) {
    if (variable.required && values[variable.name] === undefined) {
      missing.add(variable.name);
    }
  }

  for (const name of placeholdersOf(prompt.template)) {
    if (!declared.has(name) && values[name] === undefined) {
      missing.add(name);
    }
  }

  if (missing.size > 0) {
    throw new MissingTemplateVariableError([...missing]);
  }

  return prompt.template.replace(
    PLACEHOLDER,
    (_placeholder: string, name: string) => values[name] ?? ""
  );
}

export const GROUNDING_INSTRUCTIONS = `You are an intelligent assistant that answers questions about the records in your database.
You are friendly, helpful and concise.
Answer ONLY from the database record below. Do not use outside knowledge.
If the record does not contain enough information to answer the question, say "I don't know".`;

/** Grounded answer prompt: one retrieved record, the question, optional history. */
export const GROUNDED_ANSWER_TEMPLATE: PromptTemplate = {
  template: `${GROUNDING_INSTRUCTIONS}

Database record:
{{db_record}}

Conversation so far:
{{history}}

Question:
{{query_term}}`,
  variables: [
    { name: "db_record", required: true },
    { name: "query_term", required: true },
    { name: "history", required: false },
  ],
};
