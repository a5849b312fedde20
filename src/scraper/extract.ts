import type {
  ButtonInfo,
  ExtractedPage,
  FormField,
  FormInfo,
  ImageInfo,
  InputInfo,
  LinkInfo,
  MetaTag,
  PageStructure,
} from "./types.js";

/**
 * Read the structure of the current document.
 *
 * This runs inside the browser via `page.evaluate`, so it must stay
 * self-contained: no references to anything outside its own body.
 */
export function extractPageData(baseUrl: string): ExtractedPage {
  const attr = (el: Element, name: string): string => el.getAttribute(name) ?? "";
  const text = (el: Element): string => (el.textContent ?? "").replace(/\s+/g, " ").trim();

  const absolute = (href: string): string => {
    if (!href) return "";
    try {
      return new URL(href, baseUrl).href;
    } catch {
      return href;
    }
  };

  const hostOf = (url: string): string => {
    try {
      return new URL(url).host;
    } catch {
      return "";
    }
  };

  const baseHost = hostOf(baseUrl);

  const forms: FormInfo[] = Array.from(document.querySelectorAll("form")).map((form) => {
    const fields: FormField[] = Array.from(
      form.querySelectorAll("input, textarea, select")
    ).map((field) => {
      const tag = field.tagName.toLowerCase();
      const entry: FormField = {
        tag,
        type: attr(field, "type") || (tag === "input" ? "text" : tag),
        name: attr(field, "name"),
        id: attr(field, "id"),
        placeholder: attr(field, "placeholder"),
        required: field.hasAttribute("required"),
        value: attr(field, "value"),
      };
      if (tag === "select") {
        entry.options = Array.from(field.querySelectorAll("option")).map((option) => ({
          value: attr(option, "value"),
          text: text(option),
        }));
      }
      return entry;
    });

    return {
      id: attr(form, "id"),
      name: attr(form, "name"),
      action: attr(form, "action"),
      method: (attr(form, "method") || "GET").toUpperCase(),
      enctype: attr(form, "enctype"),
      fields,
    };
  });

  const links: LinkInfo[] = Array.from(document.querySelectorAll("a[href]")).map((link) => {
    const href = attr(link, "href");
    const absoluteUrl = absolute(href);
    return {
      text: text(link),
      href,
      absoluteUrl,
      title: attr(link, "title"),
      id: attr(link, "id"),
      target: attr(link, "target"),
      isExternal: hostOf(absoluteUrl) !== baseHost,
    };
  });

  const buttons: ButtonInfo[] = [
    ...Array.from(document.querySelectorAll("button")).map(
      (button): ButtonInfo => ({
        tag: "button",
        type: attr(button, "type") || "button",
        text: text(button),
        id: attr(button, "id"),
        name: attr(button, "name"),
        disabled: button.hasAttribute("disabled"),
      })
    ),
    ...Array.from(
      document.querySelectorAll(
        "input[type='button'], input[type='submit'], input[type='reset']"
      )
    ).map(
      (input): ButtonInfo => ({
        tag: "input",
        type: attr(input, "type"),
        text: attr(input, "value"),
        id: attr(input, "id"),
        name: attr(input, "name"),
        disabled: input.hasAttribute("disabled"),
      })
    ),
  ];

  const inputs: InputInfo[] = Array.from(document.querySelectorAll("input")).map((input) => ({
    type: attr(input, "type") || "text",
    name: attr(input, "name"),
    id: attr(input, "id"),
    placeholder: attr(input, "placeholder"),
    value: attr(input, "value"),
    required: input.hasAttribute("required"),
    readonly: input.hasAttribute("readonly"),
    disabled: input.hasAttribute("disabled"),
    maxLength: attr(input, "maxlength"),
    minLength: attr(input, "minlength"),
    pattern: attr(input, "pattern"),
  }));

  const images: ImageInfo[] = Array.from(document.querySelectorAll("img")).map((img) => {
    const src = attr(img, "src");
    return {
      src,
      absoluteUrl: absolute(src),
      alt: attr(img, "alt"),
      title: attr(img, "title"),
      id: attr(img, "id"),
      width: attr(img, "width"),
      height: attr(img, "height"),
    };
  });

  const metaTags: MetaTag[] = Array.from(document.querySelectorAll("meta")).map((meta) => ({
    name: attr(meta, "name"),
    content: attr(meta, "content"),
    property: attr(meta, "property"),
    charset: attr(meta, "charset"),
    httpEquiv: attr(meta, "http-equiv"),
  }));

  const pageStructure: PageStructure = { headings: {}, sections: [], navigation: [] };

  for (let level = 1; level <= 6; level++) {
    const headings = Array.from(document.querySelectorAll(`h${level}`)).map(text);
    if (headings.length > 0) {
      pageStructure.headings[`h${level}`] = headings;
    }
  }

  for (const el of Array.from(document.querySelectorAll("section[class], article[class], div[class]"))) {
    pageStructure.sections.push({
      tag: el.tagName.toLowerCase(),
      className: attr(el, "class"),
      id: attr(el, "id"),
    });
  }

  for (const el of Array.from(document.querySelectorAll("nav, div[class]"))) {
    const className = attr(el, "class");
    if (el.tagName.toLowerCase() !== "nav" && !className.toLowerCase().includes("nav")) {
      continue;
    }
    pageStructure.navigation.push({
      className,
      links: Array.from(el.querySelectorAll("a")).map((a) => ({
        text: text(a),
        href: attr(a, "href"),
      })),
    });
  }

  return {
    title: document.title.trim(),
    forms,
    links,
    buttons,
    inputs,
    images,
    metaTags,
    pageStructure,
  };
}
