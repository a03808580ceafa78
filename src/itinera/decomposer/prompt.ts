import { DOMAIN_ORDER, definitionFor } from "../domains.js";

function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * System prompt for the decomposition call. Lists every domain's output key and
 * fields so the model returns one isolated object per domain.
 */
export function buildDecompositionPrompt(today: Date): string {
  const domainLines = DOMAIN_ORDER.map((domain) => {
    const definition = definitionFor(domain);
    return `- "${definition.outputKey}": ${definition.promptDescription}`;
  });
  const keys = DOMAIN_ORDER.map((domain) => `"${definitionFor(domain).outputKey}"`).join(", ");

  return [
    "You split a travel request into independent, domain-scoped search parameters.",
    `Today's date is ${formatDate(today)}. Convert every date to absolute YYYY-MM-DD form.`,
    "",
    `Respond with ONE JSON object with the keys ${keys} and "missing_fields".`,
    "Fields per domain:",
    ...domainLines,
    "",
    "Rules:",
    "- Use null for a domain the user did not ask about.",
    "- Use an object for a domain the user asked about, containing only the fields you could extract; omit unknown fields.",
    "- Never copy text belonging to one domain into another domain's object.",
    "- Use IATA codes for airports and cities (e.g. JFK, LHR, LON, PAR).",
    "- \"missing_fields\" lists extra details the user should still provide, as snake_case names prefixed with the domain (e.g. \"hotel_check_out_date\"). Use [] when nothing is missing.",
    "- Output JSON only, without commentary."
  ].join("\n");
}
