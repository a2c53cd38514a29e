/**
 * Mustache-style {{variable}} interpolation for prompt templates.
 * Arrays render as a comma-separated list. Substituted values are not re-scanned,
 * so document text containing braces passes through untouched.
 */

export type TemplateValue = string | number | readonly string[];

export type TemplateVariables = Record<string, TemplateValue>;

const TEMPLATE_PATTERN = /\{\{\s*([\w.]+)\s*\}\}/g;

/**
 * @throws Error if the template references a variable that is not provided
 */
export function renderTemplate(template: string, variables: TemplateVariables): string {
  return template.replace(TEMPLATE_PATTERN, (_match: string, name: string) => {
    const value = variables[name];
    if (value === undefined) {
      throw new Error(
        `Template variable '${name}' is not defined. Available variables: ${Object.keys(variables).join(', ')}`
      );
    }
    if (typeof value === 'string' || typeof value === 'number') {
      return String(value);
    }
    return value.join(', ');
  });
}

export function extractTemplateVariables(template: string): string[] {
  const names = new Set<string>();
  for (const match of template.matchAll(TEMPLATE_PATTERN)) {
    if (match[1]) names.add(match[1]);
  }
  return Array.from(names);
}
