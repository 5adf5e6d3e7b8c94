/**
 * Prompt fragments shared by every statement template.
 */

export const NUMBER_RULES = `NUMBER HANDLING:
- Strip currency symbols (₱, $, €, £, ¥) and thousands separators: ₱249,788,478 = 249788478
- Parentheses mean negative: (26,278) = -26278
- If a line has no readable amount, set value to null and confidence to 0.1`;

export const YEAR_RULES = `YEAR COLUMNS:
- Year headers such as "2024" or "2023" are column labels, never values
- The leftmost or most recent column is base_year, the next ones are year_1, year_2, year_3
- value repeats the base_year amount
- Only include year fields that hold an amount
- List the actual years in years_detected and name the primary one in base_year`;

export const CONFIDENCE_RULES = `CONFIDENCE (0 to 1):
- 0.9-1.0: unambiguous
- 0.7-0.9: clear with minor formatting complexity
- 0.5-0.7: reasonable interpretation
- below 0.5: uncertain or barely visible`;

export const OUTPUT_SHAPE = `Respond with a single JSON object:
{
  "statement_type": "title exactly as printed",
  "company_name": "string",
  "period": "string",
  "currency": "ISO code such as PHP or USD",
  "years_detected": ["2024", "2023"],
  "base_year": "2024",
  "line_items": {
    "<section_name>": {
      "<line_item_name>": { "value": 0, "confidence": 0.95, "base_year": 0, "year_1": 0 }
    }
  },
  "summary_metrics": {
    "<metric_name>": { "value": 0, "confidence": 0.9 }
  },
  "notes": "observations about layout or data quality"
}
Use snake_case keys taken from the document's own wording ("Cash and Cash Equivalents" -> "cash_and_cash_equivalents").`;

export const USER_PROMPT_TEMPLATE = `Extract every line item with a label and an amount from this {{statement_type}} (page {{page_num}}).

The page text layer is included below to help read small print. Prefer the image where they disagree.

PAGE TEXT:
{{page_text}}`;
