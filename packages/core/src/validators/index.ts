/**
 * Docstring validators - rules applied to extracted docstrings
 */

export { DocstringValidator, createExtraRule } from './docstring-validator.js';
export { LineLengthRule } from './line-length-rule.js';
export { NumpySectionsRule } from './numpy-sections-rule.js';
export { SummaryPeriodRule } from './summary-period-rule.js';

export type { DocstringContext, DocstringRule, ValidatorConfig } from './types.js';
