import {
  createElement,
  escapeHtml,
  type HostWindow,
  listen,
  querySelector,
  querySelectorAll,
} from "../util/util.ts";

export const modalSelector = ".modal-overlay";

/**
 * Open an overlay dialog
 *
 * Any dialog already open is closed first. Elements carrying
 * `data-modal-close`, and clicks on the overlay itself, close the dialog.
 *
 * @param title Dialog title, escaped
 * @param body Dialog body HTML, already escaped
 * @param footer Dialog footer HTML, already escaped
 * @returns The overlay element
 */
export const openModal = (
  win: HostWindow,
  { title, body, footer = "", size = "" }: {
    readonly title: string;
    readonly body: string;
    readonly footer?: string;
    readonly size?: string;
  },
): HTMLElement => {
  const { document } = win;
  closeModal(document);

  const overlay = createElement(
    document,
    "div",
    modalSelector.slice(1),
    `<div class="modal-dialog${size ? " " + size : ""}"><div class="modal-content"><div class="modal-header"><h5 class="modal-title">${
      escapeHtml(title)
    }</h5><button class="btn-close" data-modal-close>&times;</button></div><div class="modal-body">${body}</div>${
      footer && `<div class="modal-footer">${footer}</div>`
    }</div></div>`,
  );

  querySelectorAll("[data-modal-close]", overlay).forEach((el) =>
    listen(el, "click", () => overlay.remove())
  );
  listen(overlay, "click", (e) => {
    if (e.target === overlay) overlay.remove();
  });

  document.body.append(overlay);
  overlay.style.display = "flex";
  return overlay;
};

/** Close the open dialog, if any */
export const closeModal = (doc: Document): void =>
  querySelector(modalSelector, doc)?.remove();

/** Show an error inside a dialog's `.alert` slot */
export const showModalError = (slot: HTMLElement | null, message: string) => {
  if (slot) {
    slot.textContent = message;
    slot.classList.remove("d-none");
  }
};
