export interface SelectOption {
  value: string;
  text: string;
}

export interface FormField {
  tag: string;
  type: string;
  name: string;
  id: string;
  placeholder: string;
  required: boolean;
  value: string;
  options?: SelectOption[];
}

export interface FormInfo {
  id: string;
  name: string;
  action: string;
  method: string;
  enctype: string;
  fields: FormField[];
}

export interface LinkInfo {
  text: string;
  href: string;
  absoluteUrl: string;
  title: string;
  id: string;
  target: string;
  isExternal: boolean;
}

export interface ButtonInfo {
  tag: "button" | "input";
  type: string;
  text: string;
  id: string;
  name: string;
  disabled: boolean;
}

export interface InputInfo {
  type: string;
  name: string;
  id: string;
  placeholder: string;
  value: string;
  required: boolean;
  readonly: boolean;
  disabled: boolean;
  maxLength: string;
  minLength: string;
  pattern: string;
}

export interface ImageInfo {
  src: string;
  absoluteUrl: string;
  alt: string;
  title: string;
  id: string;
  width: string;
  height: string;
}

export interface MetaTag {
  name: string;
  content: string;
  property: string;
  charset: string;
  httpEquiv: string;
}

export interface PageStructure {
  headings: Record<string, string[]>;
  sections: { tag: string; className: string; id: string }[];
  navigation: { className: string; links: { text: string; href: string }[] }[];
}

/**
 * Everything the DOM extraction routine reads from a loaded page.
 */
export interface ExtractedPage {
  title: string;
  forms: FormInfo[];
  links: LinkInfo[];
  buttons: ButtonInfo[];
  inputs: InputInfo[];
  images: ImageInfo[];
  metaTags: MetaTag[];
  pageStructure: PageStructure;
}

export interface ScrapeResult extends ExtractedPage {
  readonly url: string;
  readonly html: string;
  /** Milliseconds from navigation start to extraction end. */
  readonly loadTime: number;
  readonly statusCode: number;
}

export interface ScrapeOptions {
  headless: boolean;
}

/**
 * Collaborator that loads a page and returns its structure. Owns a browser
 * session that must be released with `close()`.
 */
export interface PageScraper {
  scrape(url: string, options: ScrapeOptions): Promise<ScrapeResult>;
  close(): Promise<void>;
}
