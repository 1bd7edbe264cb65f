import type { Page } from "../schema/page.js";

export interface SiteRequest {
  description: string;
  siteStyle?: string;
  numPages: number;
}

/** Produces the initial, uncorrected pages of a site */
export interface SiteGenerator {
  generate(request: SiteRequest): Promise<Page[]>;
}
