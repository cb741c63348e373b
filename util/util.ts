/**
 * Common client code shared by the router, the feature scripts and the UI
 * components.
 *
 * Helpers taking a window or a parent node never reach for globals, so the
 * same code runs against the browser's `window` and against a test window.
 *
 * @example Log the first link's text on click, then stop listening
 * ```ts
 * const link = querySelector<HTMLAnchorElement>("a", document.body);
 * const unsub = link && listen(link, "click", () => console.log(link.text));
 * unsub?.();
 * ```
 *
 * @module
 */

// Const

/** `null` */
export const NULL: null = null;

// FP

/**
 * @param v Value
 * @returns `typeof v === "string"`
 */
export const isString = (v: unknown): v is string => typeof v === "string";

/**
 * @param v Value
 * @returns `typeof v === "number"` and not `NaN`
 */
export const isNumber = (v: unknown): v is number =>
  typeof v === "number" && !Number.isNaN(v);

/**
 * @param v Value
 * @returns Whether `v` is a non-null object that may be indexed by string
 */
export const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === "object" && v !== NULL && !isArray(v);

/** See {@linkcode Array.isArray} */
export const isArray = /* @__PURE__ */ Array.isArray;

/** See {@linkcode Object.entries} */
export const entries = /* @__PURE__ */ Object.entries;

/**
 * Promisified version of `setTimeout`
 *
 * @param delay Timeout delay in milliseconds
 * @returns Promise resolving after `delay`
 */
export const timeout = (delay: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, delay));

/** Subset of {@linkcode Console} the client logs through */
export type Logger = Pick<Console, "debug" | "info" | "warn" | "error">;

/**
 * Run a promise without awaiting it, logging its rejection
 *
 * @param promise Promise to detach
 * @param log Logger receiving the rejection
 * @param message Message logged along the error
 */
export const detach = (
  promise: Promise<unknown>,
  log: Logger,
  message: string,
): void => {
  promise.catch((e: unknown) => log.error(message, e));
};

// DOM

/** Constructor of a widget bound to one element */
export type WidgetConstructor = new (element: Element) => unknown;

/** Widget libraries a page may load as globals */
export type PageGlobals = {
  readonly bootstrap?: {
    readonly Tooltip?: WidgetConstructor;
    readonly Popover?: WidgetConstructor;
    readonly Alert?: new (element: Element) => { close(): void };
  };
  readonly Chart?: unknown;
  readonly initializeCharts?: () => void;
};

/** Constructors and objects the client needs from its host window */
export type HostWindow =
  & Pick<
    Window,
    | "document"
    | "history"
    | "location"
    | "localStorage"
    | "innerWidth"
    | "scrollTo"
    | "addEventListener"
    | "removeEventListener"
    | "dispatchEvent"
  >
  & {
    readonly DOMParser: typeof DOMParser;
    readonly CustomEvent: typeof CustomEvent;
  }
  & PageGlobals;

/**
 * Parse HTML with the window's {@linkcode DOMParser}
 *
 * @param win Host window
 * @param html HTML string
 * @returns HTML Document
 */
export const domParse = (win: HostWindow, html: string): Document =>
  new win.DOMParser().parseFromString(html, "text/html");

/**
 * Create an element with a class name and inner HTML
 *
 * @param doc Owner document
 * @param tag Tag name
 * @param className Class attribute
 * @param html Inner HTML, already escaped
 * @returns Created element
 */
export const createElement = <K extends keyof HTMLElementTagNameMap>(
  doc: Document,
  tag: K,
  className = "",
  html = "",
): HTMLElementTagNameMap[K] => {
  const el = doc.createElement(tag);
  if (className) el.className = className;
  if (html) el.innerHTML = html;
  return el;
};

/**
 * Escape text before interpolating it in HTML
 *
 * @param text Raw text
 * @returns Text safe to use as HTML content or attribute value
 */
export const escapeHtml = (text: string | number): string =>
  String(text).replace(
    /[&<>"']/g,
    (c) => `&#${c.charCodeAt(0)};`,
  );

/**
 * Narrow an event target to an element
 *
 * @param t Event target
 * @returns Whether `t` is an {@linkcode Element}
 */
export const isElement = (t: EventTarget | null): t is Element =>
  t != NULL && "closest" in t && "getAttribute" in t;

/** See {@linkcode Event.preventDefault} */
export const preventDefault = (e: Event): void => e.preventDefault();

/** See {@linkcode Document.querySelector} */
export const querySelector = <E extends Element = HTMLElement>(
  selector: string,
  node: ParentNode,
): E | null => node.querySelector<E>(selector);

/** See {@linkcode Document.querySelectorAll} */
export const querySelectorAll = <E extends Element = HTMLElement>(
  selector: string,
  node: ParentNode,
): NodeListOf<E> => node.querySelectorAll<E>(selector);

/**
 * Get an element by id
 *
 * @param doc Document to search
 * @param id Element id
 */
export const byId = <E extends HTMLElement = HTMLElement>(
  doc: Document,
  id: string,
): E | null => querySelector<E>(`#${id}`, doc);

/** Typed event type */
export type EventType<T> =
  & { (win: HostWindow, detail: T): CustomEvent<T> }
  & { readonly type: string };

/**
 * Declare an event type
 *
 * @param opts Event definition object - Has an explicit "type" and any option that accepts {@linkcode CustomEvent}'s constructor
 * @returns Factory generating event of declared type in provided window
 */
export const eventType = <T>(
  { type, ...opts }: Omit<CustomEventInit<T>, "detail"> & { type: string },
): EventType<T> => {
  const factory = (win: HostWindow, detail: T) =>
    new win.CustomEvent(type, {
      bubbles: true,
      cancelable: true,
      detail,
      ...opts,
    });
  return Object.assign(factory, { type });
};

/**
 * Compact wrapper for `addEventListener` and `removeEventListener`
 *
 * @param target Target that listens
 * @param event Event type
 * @param cb Callback to run
 * @param options `addEventListener` options
 * @returns Function removing the listener
 */
export const listen = <
  T extends EventTarget,
  K extends string,
>(
  target: T,
  event: K,
  cb: (
    e: K extends keyof HTMLElementEventMap ? HTMLElementEventMap[K] : Event,
  ) => void,
  options?: boolean | AddEventListenerOptions | undefined,
): () => void => {
  const listener = cb as EventListener;
  target.addEventListener(event, listener, options);
  return () => target.removeEventListener(event, listener, options);
};

/** Object-style CSS rules declaration */
export type CSSRules = Record<string, CSSDeclaration | string>;

type CSSDeclaration = { [k: string]: string | number | CSSDeclaration };

const camelRegExp = /[A-Z]/g;

/**
 * Switch case from camel to hyphens
 *
 * @param camel Camel-case
 * @returns Hyphens-case
 */
export const hyphenize = (camel: string): string =>
  camel.replace(
    camelRegExp,
    (l: string) => "-" + l.toLowerCase(),
  );

/**
 * Convert CSS rules to CSS
 *
 * @param rules CSS rules
 * @returns CSS
 */
export const toCSS = (rules: CSSRules): string =>
  entries(rules).map(([selector, declaration]) =>
    isString(declaration)
      ? selector + declaration
      : toRule(selector, declaration)
  ).join("");

const toRule = (selector: string, declaration: CSSDeclaration): string =>
  `${selector}{${
    entries(declaration)
      .map(([property, value]) =>
        typeof value === "object"
          ? toRule(property, value)
          : `${hyphenize(property)}:${value}${
            typeof value === "number" ? "px" : ""
          };`
      )
      .join("")
  }}`;

/**
 * Append a stylesheet to the document's head
 *
 * @param doc Target document
 * @param rules CSS rules
 * @returns Created `<style>` element
 */
export const adoptStyle = (doc: Document, rules: CSSRules): HTMLStyleElement => {
  const style = doc.createElement("style");
  style.textContent = toCSS(rules);
  doc.head.append(style);
  return style;
};
