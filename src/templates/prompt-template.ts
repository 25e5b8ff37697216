/**
 * A prompt with `{{name}}` placeholders
 */
export interface PromptTemplate {
  template: string;
  description?: string;
  requiredVariables?: string[];
}

/**
 * Fill the placeholders of a template.
 * Throws when a required variable is missing; unknown placeholders are left as written.
 */
export function interpolateTemplate(template: PromptTemplate, variables: Record<string, string>): string {
  const missing = (template.requiredVariables ?? []).filter((name) => variables[name] === undefined);
  if (missing.length > 0) {
    throw new Error(`Missing required variables: ${missing.join(', ')}`);
  }

  return template.template.replace(/\{\{(\w+)\}\}/g, (placeholder: string, name: string) =>
    Object.prototype.hasOwnProperty.call(variables, name) ? variables[name] : placeholder
  );
}
