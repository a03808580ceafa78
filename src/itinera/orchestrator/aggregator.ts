import { DOMAIN_ORDER, isInScope, type DecomposedQuery, type DomainName } from "../domains.js";
import { failure, type AnyDomainOutcome, type DomainOutcome } from "../specialists/types.js";
import type { DomainOutcomeMap, FinalResponse, ResponseStatus } from "./types.js";

export const NO_OUTCOME_RECORDED = "no outcome recorded";

function outcomeFor<D extends DomainName>(domain: D, outcomes: DomainOutcomeMap): DomainOutcome<D> {
  return outcomes[domain] ?? failure(domain, { type: "unknown", message: NO_OUTCOME_RECORDED });
}

export function deriveStatus(outcomes: readonly AnyDomainOutcome[], missingFields: readonly string[]): ResponseStatus {
  const succeeded = outcomes.filter((outcome) => outcome.kind === "success").length;
  if (succeeded === 0) {
    return "unanswered";
  }
  return succeeded === outcomes.length && missingFields.length === 0 ? "complete" : "partial";
}

/**
 * Merge per-domain outcomes into one response. Order follows DOMAIN_ORDER,
 * never completion or insertion order, so equal inputs serialize identically.
 */
export function aggregate(decomposed: DecomposedQuery, outcomes: DomainOutcomeMap): FinalResponse {
  const ordered: AnyDomainOutcome[] = [];
  for (const domain of DOMAIN_ORDER) {
    if (isInScope(decomposed, domain)) {
      ordered.push(outcomeFor(domain, outcomes));
    }
  }
  const missingFields = [...decomposed.missingFields];
  return {
    status: deriveStatus(ordered, missingFields),
    outcomes: ordered,
    missingFields
  };
}
