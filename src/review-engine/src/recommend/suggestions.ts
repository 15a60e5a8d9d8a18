import { IssueType } from '../types';

export const FALLBACK_SUGGESTION = 'Review and adjust according to project standards.';

const SUGGESTIONS: Record<IssueType, Record<string, string>> = {
  style: {
    indentation: "Follow the project's indentation pattern.",
    line_length:
      'Keep lines within the maximum length. Consider breaking long lines or using appropriate line continuation techniques.',
    naming_convention: "Follow the project's naming convention for consistency.",
  },
  architecture: {
    uncommon_import:
      'Consider if a standard library or commonly used import in the project would be more appropriate.',
    uncommon_from_import:
      'Consider if a standard library or commonly used import in the project would be more appropriate.',
    uncommon_js_import:
      'Consider if a standard library or commonly used import in the project would be more appropriate.',
    error_handling: 'Add appropriate error handling based on project patterns.',
  },
  functionality: {
    logging: "Use the project's logging framework instead of print statements.",
    testing: "Add appropriate test assertions following the project's testing patterns.",
  },
};

export function suggestionFor(type: IssueType, subtype: string): string {
  const byType = SUGGESTIONS[type];
  return (Object.hasOwn(byType, subtype) && byType[subtype]) || FALLBACK_SUGGESTION;
}
