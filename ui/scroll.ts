import { isElement, listen, NULL, preventDefault } from "../util/util.ts";

/**
 * Smooth scrolling for in-page `#fragment` links
 *
 * @returns Function removing the listener
 */
export const initAnchorScroll = (doc: Document): () => void =>
  listen(doc, "click", (e) => {
    const { target } = e,
      link = isElement(target) ? target.closest('a[href^="#"]') : NULL,
      id = link?.getAttribute("href")?.slice(1);
    if (!link) return;
    preventDefault(e);
    if (id) {
      doc.getElementById(id)?.scrollIntoView({
        behavior: "smooth",
        block: "start",
      });
    }
  });
