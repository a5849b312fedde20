export type {
  ScrapeResult,
  ScrapeOptions,
  PageScraper,
  ExtractedPage,
  FormInfo,
  FormField,
  LinkInfo,
  ButtonInfo,
  InputInfo,
  ImageInfo,
  MetaTag,
  PageStructure,
} from "./types.js";
export { WebScraper, browserTypeFor } from "./scraper.js";
export { extractPageData } from "./extract.js";
