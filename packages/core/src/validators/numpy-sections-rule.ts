/**
 * NumPy sections - functions that take parameters document them under a
 * dashed `Parameters` header, followed by a dashed `Returns` header.
 * Classes document the parameters of `__init__` and have no `Returns`.
 */

import type { Violation } from '../types.js';

import { docstringLine } from './lines.js';
import type { DocstringContext, DocstringRule } from './types.js';

const PARAMETERS_UNDERLINE = '----------';
const RETURNS_UNDERLINE = '-------';
const DESCRIPTION_INDENT = '    ';

export class NumpySectionsRule implements DocstringRule {
  readonly id = 'docstring-numpy-sections';
  readonly description = 'Docstring must document parameters and returns in NumPy format';

  check(context: DocstringContext): Violation[] {
    const { candidate, lines } = context;
    if (candidate.scopeKind === 'module' || !candidate.parameters || candidate.parameters.length === 0) {
      return [];
    }

    const fail = (index: number, message: string): Violation[] => [
      {
        filePath: context.filePath,
        line: docstringLine(candidate, index),
        ruleId: this.id,
        message,
        severity: 'error',
      },
    ];

    const header = lines.findIndex((line) => line.trim() === 'Parameters');
    if (header === -1) {
      return fail(0, "Missing 'Parameters' section in docstring");
    }
    if (lines[header + 1]?.trim() !== PARAMETERS_UNDERLINE) {
      return fail(header + 1, "Missing dashed underline under 'Parameters'");
    }

    const bodyIndent = leadingWhitespace(lines[header]) + DESCRIPTION_INDENT;
    let i = header + 2;
    if (i >= lines.length || lines[i].trim() === '') {
      return fail(i, "Parameter must be in format '<name> : <type>'");
    }

    while (i < lines.length && lines[i].trim() !== '') {
      if (!isParameterEntry(lines[i])) {
        return fail(i, "Parameter must be in format '<name> : <type>'");
      }
      i++;
      if (!isDescription(lines[i], bodyIndent)) {
        return fail(i, 'Parameter description must be indented by 4 spaces');
      }
      while (isDescription(lines[i], bodyIndent)) {
        i++;
      }
    }

    if (candidate.scopeKind === 'class') {
      return [];
    }

    // Skip the blank line that ends the parameter block
    i++;
    if (i >= lines.length || lines[i].trim() !== 'Returns') {
      return fail(i, "Missing 'Returns' section after parameters");
    }
    if (lines[i + 1]?.trim() !== RETURNS_UNDERLINE) {
      return fail(i + 1, "Missing dashed underline under 'Returns'");
    }

    i += 2;
    if (i >= lines.length || lines[i].trim() === '') {
      return fail(i, 'Return type must be specified');
    }

    i++;
    if (!isDescription(lines[i], bodyIndent)) {
      return fail(i, 'Return description must be indented by 4 spaces');
    }

    return [];
  }
}

function leadingWhitespace(line: string): string {
  return line.slice(0, line.length - line.trimStart().length);
}

function isParameterEntry(line: string): boolean {
  const entry = line.trim();
  const separator = entry.indexOf(' : ');
  return separator > 0 && entry.slice(separator + 3).trim().length > 0;
}

function isDescription(line: string | undefined, indent: string): boolean {
  return line !== undefined && line.startsWith(indent) && line.trim().length > 0;
}
