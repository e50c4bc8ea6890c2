import { FINDINGS_JSON_SCHEMA } from './schema.js';
import type { FileContent } from './types.js';

export function formatFiles(files: FileContent[]): string {
  return files.map((f) => `### ${f.path}\n\`\`\`\n${f.content}\n\`\`\``).join('\n\n');
}

/** The user turn of an audit request: prior decisions (if any), the files, and the output contract. */
export function buildUserMessage(files: FileContent[], decisionContext: string): string {
  const parts: string[] = ['Review the following codebase files and report any findings.'];

  if (decisionContext.trim()) parts.push(decisionContext.trim());

  parts.push(`## Files\n\n${formatFiles(files)}`);
  parts.push(
    [
      'Respond with a JSON object matching this schema:',
      '```json',
      JSON.stringify(FINDINGS_JSON_SCHEMA, null, 2),
      '```',
      'If there is nothing to report, return {"findings": []}.',
      'Return ONLY the JSON object, no other text.',
    ].join('\n')
  );

  return parts.join('\n\n');
}

/**
 * System prompt for the pre-pass. Relevance is carried on the severity field:
 * high means send in full, medium a snippet, low a structural map.
 */
export function buildClassificationPrompt(focusNames: string[]): string {
  return [
    'You are triaging a codebase before a detailed audit.',
    `The audit will cover: ${focusNames.join(', ')}.`,
    '',
    'For every file that matters to that audit, emit one finding whose `file` is the exact path and whose `severity` is the relevance tier:',
    '- `high`: the auditor needs the whole file',
    '- `medium`: a representative excerpt is enough',
    '- `low`: only the structure (definitions and comments) is useful',
    '',
    'Put a one-line justification in `description` and use the file path as `title`.',
    'Leave out files that are irrelevant to the audit; they will not be sent.',
  ].join('\n');
}
