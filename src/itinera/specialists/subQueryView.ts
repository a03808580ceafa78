import {
  definitionFor,
  subQueryFor,
  type DecomposedQuery,
  type DomainName,
  type DomainQueryMap
} from "../domains.js";

/**
 * Everything a specialist is allowed to see: its domain, a frozen copy of that
 * domain's sub-query, and a summary rendered from the sub-query alone.
 *
 * The constructor is private, so the only way to obtain a view is
 * `SubQueryView.from`, which never reads the original request text.
 */
export class SubQueryView<D extends DomainName> {
  readonly domain: D;
  readonly summary: string;
  private readonly payload: Readonly<DomainQueryMap[D]>;

  private constructor(domain: D, query: DomainQueryMap[D]) {
    this.domain = domain;
    this.summary = definitionFor(domain).describe(query);
    this.payload = Object.freeze(structuredClone(query));
    Object.freeze(this);
  }

  get query(): Readonly<DomainQueryMap[D]> {
    return this.payload;
  }

  /**
   * Returns undefined when the domain is not in scope for this request.
   */
  static from<D extends DomainName>(decomposed: DecomposedQuery, domain: D): SubQueryView<D> | undefined {
    const query = subQueryFor(decomposed.subQueries, domain);
    return query === undefined ? undefined : new SubQueryView(domain, query);
  }

  toJSON(): { domain: D; summary: string; query: Readonly<DomainQueryMap[D]> } {
    return { domain: this.domain, summary: this.summary, query: this.payload };
  }
}
