import {
  adoptStyle,
  byId,
  createElement,
  domParse,
  type HostWindow,
  querySelector,
  querySelectorAll,
  timeout,
} from "../util/util.ts";
import { matchSection, type SectionTable } from "./policy.ts";
import { overlayId, routerStyles } from "./styles.ts";

export const contentSelector = ".page-content";
export const titleSelector = ".page-title";

const exitClass = "spa-page-exit";
const enterClass = "spa-page-enter";
const transitioningClass = "spa-transitioning";
const linkLoadingClass = "spa-loading";
const sidebarUpdatingClass = "spa-updating";

/** Fetched page lacks the content container */
export class PageStructureError extends Error {
  constructor(public readonly url: string) {
    super(`Invalid page structure: no ${contentSelector} in ${url}`);
    this.name = "PageStructureError";
  }
}

export type ParsedPage = {
  readonly content: Element;
  readonly title?: string;
  readonly pageTitle?: string;
};

/**
 * Extract what the router swaps from a fetched page
 *
 * @throws {PageStructureError} when the page has no content container
 */
export const parsePage = (
  win: HostWindow,
  html: string,
  url: string,
): ParsedPage => {
  const received = domParse(win, html),
    content = querySelector<Element>(contentSelector, received);
  if (!content) throw new PageStructureError(url);
  return {
    content,
    title: querySelector<Element>("title", received)?.textContent ?? undefined,
    pageTitle: querySelector<Element>(titleSelector, received)?.textContent ??
      undefined,
  };
};

export const applyTitles = (
  doc: Document,
  { title, pageTitle }: ParsedPage,
): void => {
  if (title != null) doc.title = title;
  if (pageTitle != null) {
    const current = querySelector(titleSelector, doc);
    if (current) current.textContent = pageTitle;
  }
};

/**
 * Two-phase content swap: exit, replace, enter
 *
 * Only the exit phase is awaited; enter markers are cleared on a timer.
 */
export const transitionContent = async (
  doc: Document,
  received: Element,
  url: string,
  { exitDelay, enterDelay }: {
    readonly exitDelay: number;
    readonly enterDelay: number;
  },
): Promise<void> => {
  const current = querySelector(contentSelector, doc);
  if (!current) throw new PageStructureError(url);
  const { classList } = current;

  classList.add(transitioningClass, exitClass);
  await timeout(exitDelay);

  current.innerHTML = received.innerHTML;

  classList.remove(exitClass);
  classList.add(enterClass);
  setTimeout(() => classList.remove(enterClass, transitioningClass), enterDelay);
};

export const updateActiveNavigation = (
  doc: Document,
  url: string,
  table?: SectionTable,
): void => {
  querySelectorAll(".nav-link.active", doc).forEach((link) =>
    link.classList.remove("active")
  );

  const exact = querySelector(`a[href="${quoteAttr(url)}"]`, doc);
  if (exact?.classList.contains("nav-link")) exact.classList.add("active");

  const section = matchSection(url, table);
  if (section) {
    querySelector(`.nav-link[href*="${quoteAttr(section[0])}"]`, doc)
      ?.classList.add("active");
  }
};

// Attribute values are quoted, so only quotes and backslashes need escaping
const quoteAttr = (value: string) => value.replace(/["\\]/g, "\\$&");

export const addLinkLoadingState = (doc: Document, link: Element): void => {
  if (link.classList.contains("nav-link")) {
    link.classList.add(linkLoadingClass);
    byId(doc, "sidebar")?.classList.add(sidebarUpdatingClass);
  }
};

export const removeLinkLoadingStates = (doc: Document): void => {
  querySelectorAll(`.nav-link.${linkLoadingClass}`, doc).forEach((link) =>
    link.classList.remove(linkLoadingClass)
  );
  byId(doc, "sidebar")?.classList.remove(sidebarUpdatingClass);
};

/** Loading overlay and router stylesheet, created once per page load */
export class LoadingOverlay {
  readonly element: HTMLElement;

  constructor(doc: Document) {
    adoptStyle(doc, routerStyles);
    this.element = createElement(
      doc,
      "div",
      "",
      `<div class="loading-content"><div class="loading-spinner">${
        '<div class="spinner-ring"></div>'.repeat(3)
      }</div><div class="loading-text">Loading...</div></div>`,
    );
    this.element.id = overlayId;
    doc.body.append(this.element);
  }

  get visible(): boolean {
    return this.element.style.display === "flex";
  }

  show(): void {
    this.element.style.display = "flex";
    this.element.style.opacity = "1";
  }

  hide(): void {
    this.element.style.opacity = "0";
    this.element.style.display = "none";
  }
}
