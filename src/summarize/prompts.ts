import fs from "node:fs";
import path from "node:path";

export const DEFAULT_INSTRUCTIONS = `Summarize the following headlines into a concise Daily Macro & Markets Recap.
Divide the summary into clear sections by region and country, using headings and bullet points.
Group closely related news together and keep only the most relevant news for financial markets.
Keep the summary within 2 pages maximum, and max 5 bullet points per country.
Use the following sections, but remove those without relevant news:
1. Euro Area (Germany, France, Italy, Spain, Greece, Portugal, Belgium, Netherlands, Austria, Ireland, Finland)
2. Nordics (Sweden, Norway, Denmark, not Switzerland)
3. United Kingdom
4. Switzerland
5. North America (only United States and Canada)
6. APAC (only China, Japan, Australia, and New Zealand)
Make a subsection for each country for sections including many countries, and keep max 5 bullet points per country.
Use a headline line for each country (e.g., United States – Housing soft, Fed bias tilts dovish).
Divide every section with a horizontal line (---).`;

export const MAP_DIRECTIVE =
  "Follow the user's instructions exactly. Do not add extra sections beyond what they ask.";

export const PARTIAL_SEPARATOR = "\n\n--- CHUNK SPLIT ---\n\n";

export function loadInstructions(instructionsPath?: string): string {
  if (!instructionsPath) return DEFAULT_INSTRUCTIONS;
  return fs.readFileSync(path.resolve(instructionsPath), "utf-8").trim();
}

export function buildChunkPrompt(args: {
  instructions: string;
  chunkText: string;
  position: number;
  total: number;
}): string[] {
  const body = [
    args.instructions,
    "",
    `CHUNK ${args.position}/${args.total} — POSTS START`,
    "<<<",
    args.chunkText,
    ">>>",
    "Return a concise markdown summary (headings + bullet points).",
  ].join("\n");

  return [MAP_DIRECTIVE, body];
}

export function buildSynthesisPrompt(args: { instructions: string; partials: string[] }): string[] {
  const body = [
    args.instructions,
    "",
    "You are given partial summaries of post batches. " +
      "Merge them into ONE well-structured Markdown document following the exact instructions above.",
    "",
    "PARTIAL SUMMARIES START",
    "<<<",
    args.partials.join(PARTIAL_SEPARATOR),
    ">>>",
    "Return ONLY the final markdown.",
  ].join("\n");

  return [body];
}
