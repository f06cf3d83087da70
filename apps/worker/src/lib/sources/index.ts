import type { AcquisitionMethod, ArticleCandidate } from "@cadence/core";
import type { HttpClient } from "../http";
import type { AttemptFor } from "../resolver";
import { acquireFeed } from "./feed";
import { acquireSitemap } from "./sitemap";

/** What an acquirer may fetch with; every location it discovers goes through `isAllowed` first. */
export type SourceContext = {
  http: HttpClient;
  isAllowed(url: string): Promise<boolean>;
};

export type Acquirer<M extends AcquisitionMethod> = (
  attempt: AttemptFor<M>,
  source: SourceContext
) => Promise<ArticleCandidate[]>;

export type Acquirers = { [M in AcquisitionMethod]: Acquirer<M> };

export const defaultAcquirers: Acquirers = {
  feed: acquireFeed,
  sitemap: acquireSitemap
};
