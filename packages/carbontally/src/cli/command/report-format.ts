import {
  CATEGORY_ORDER,
  type Category,
  type EmissionFactor,
  type FootprintResult,
  type OffsetProject,
  type RefinedResult,
  type Suggestion,
} from "@carbontally/emission-core";

const RULE = "--------------------------";

export function formatKg(kg: number) {
  return `${kg.toFixed(2)} kg CO2`;
}

function label(category: Category) {
  return category.charAt(0).toUpperCase() + category.slice(1);
}

/** human-readable baseline; details only with -v */
export function formatFootprint(result: FootprintResult, options: { verbose?: boolean } = {}): string[] {
  const lines = ["Carbon Footprint (baseline)", RULE, `Period: ${result.period}`, `Computed at: ${result.timestamp}`, ""];

  for (const category of CATEGORY_ORDER) {
    lines.push(`${label(category)}: ${formatKg(result.breakdown[category])}`);
    if (!options.verbose) continue;
    for (const [subtype, entry] of Object.entries(result.details[category])) {
      lines.push(entry.kind === "contribution" ? `  ${subtype}: ${formatKg(entry.kgCo2)}` : `  ${subtype}: ${entry.text}`);
    }
  }

  lines.push(RULE, `Total: ${formatKg(result.totalKgCo2)}`);
  return lines;
}

export function formatRefinement(result: RefinedResult): string[] {
  const lines = ["", "Refined estimate", RULE];

  for (const category of CATEGORY_ORDER) {
    const delta = result.adjustments[category];
    if (delta === 0) continue;
    const sign = delta > 0 ? "+" : "";
    lines.push(`${label(category)}: ${formatKg(result.refinedBreakdown[category])} (${sign}${delta.toFixed(2)})`);
  }

  lines.push(`Refined total: ${formatKg(result.refinedTotalKgCo2)}`);
  if (result.insights.length === 0) {
    lines.push("No contextual data: refined estimate equals the baseline.");
    return lines;
  }

  lines.push("", "Insights:");
  for (const insight of result.insights) lines.push(`- ${insight}`);
  return lines;
}

export function formatOffsets(footprintKg: number, projects: readonly OffsetProject[]): string[] {
  const lines = [`Offset options for ${formatKg(footprintKg)}`, RULE];
  for (const project of projects) {
    lines.push(
      `${project.name} [${project.type}]`,
      `  ${project.description}`,
      `  ${project.costPerTon} USD/t, total ${project.totalCost.toFixed(2)} USD`,
      `  ref ${project.certificateRef}`
    );
  }
  return lines;
}

export function formatSuggestions(suggestions: readonly Suggestion[]): string[] {
  if (suggestions.length === 0) {
    return ["No category stands out: nothing to suggest."];
  }
  return suggestions.map((s) => `${s.rank}. ${s.message}`);
}

/** -vv: every factor the table holds, with its provenance */
export function formatFactors(factors: readonly EmissionFactor[]): string[] {
  const lines = ["Emission factors", RULE];
  for (const f of factors) {
    lines.push(`${f.category}/${f.subtype}: ${f.kgCo2PerUnit} kg CO2/${f.unit} (${f.source})`);
  }
  return lines;
}
