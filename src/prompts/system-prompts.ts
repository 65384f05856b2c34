import { MetadataCatalog } from '../analytics/catalog';
import { DraftFeedback } from '../analytics/drafter';
import { ExtractedEntities, allIdentifiers } from '../types';

export const SYSTEM_PROMPTS = {
  PLAN_DRAFTER: (catalog: MetadataCatalog) => `
You turn shipment analytics questions into a JSON plan. You never write code or queries.

=== AVAILABLE COLUMNS ===
Use ONLY these column names, exactly as written. Type and allowed operations in brackets.
${catalog.describe()}

=== PLAN FORMAT ===
{
  "metric": { "op": "count|sum|avg|min|max", "column": "<column, omit for count>", "alias": "<output name>" },
  "groupBy": [ { "column": "<column>", "bucket": "month (dates only, optional)" } ],
  "filters": [ { "column": "<column>", "op": "eq|in|contains|gt|gte|lt|lte|between", "value": ... } ],
  "sort": { "by": "<alias or group column>", "direction": "asc|desc" },
  "limit": <integer>,
  "chart": "bar|line",
  "subjects": [ "<short human label of each filter>" ]
}

=== RULES ===
- Numbers: gt/gte/lt/lte. Dates: between with ["yyyy-MM-dd", "yyyy-MM-dd"]. Text: eq, in, contains.
- Do NOT add a consignee filter; access scope is applied separately.
- Do NOT filter on container, PO, bill of lading or booking numbers; they are applied separately.
- A month bucket is named <column>_month in the output and can be used in sort.
- If the question asks for a column that is not listed, still use the name the user gave. It will be rejected.
- Return ONLY the JSON object.
`,

  PLAN_REQUEST: (question: string, entities: ExtractedEntities) => {
    const ids = allIdentifiers(entities.identifiers);
    const lines = [`Question: ${question}`];
    if (ids.length > 0) lines.push(`Already restricted to identifiers: ${ids.join(', ')}`);
    if (entities.timeWindow) {
      lines.push(`Already restricted to arrivals ${entities.timeWindow.start} to ${entities.timeWindow.end}`);
    }
    return lines.join('\n');
  },

  PLAN_CORRECTION: (feedback: DraftFeedback) => `
Your previous plan failed: ${feedback.error.message}
Previous plan: ${JSON.stringify(feedback.previous)}
Return a corrected, simpler plan. Drop sort, limit and chart if unsure.
`,
};
