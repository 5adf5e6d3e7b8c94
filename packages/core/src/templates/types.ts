/**
 * Extraction Template Types
 *
 * Each statement type carries its own prompt guidance for the vision model.
 */

import type { StatementType } from '../types';

/**
 * Extraction template for a specific statement type.
 */
export interface ExtractionTemplate {
  /** The statement type this template handles */
  statementType: StatementType;

  /** System prompt with statement-specific extraction rules */
  systemPrompt: string;

  /**
   * User prompt template with placeholders:
   * - {{statement_type}}: Human-readable statement label
   * - {{page_num}}: 1-based page number in the source document
   * - {{page_text}}: Text layer of the page, for cross-checking the image
   */
  userPromptTemplate: string;

  /** Human-readable description of what this template extracts */
  description: string;
}
