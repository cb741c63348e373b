import { isElement, listen, querySelector, querySelectorAll } from "../util/util.ts";

/** Toggle a button's loading state, restoring its content afterwards */
export const setButtonLoading = (
  button: HTMLButtonElement | HTMLInputElement,
  loading = true,
): void => {
  const { dataset } = button;
  if (loading) {
    button.disabled = true;
    dataset.originalContent = button.innerHTML;
    button.innerHTML = '<span class="spinner me-2"></span>Loading...';
  } else {
    button.disabled = false;
    if (dataset.originalContent !== undefined) {
      button.innerHTML = dataset.originalContent;
      delete dataset.originalContent;
    }
  }
};

const isFormControl = (t: EventTarget | null): t is HTMLInputElement =>
  isElement(t) && t.classList.contains("form-control") && "value" in t;

/** Mark the parents of `.form-control`s holding a value under `root` */
export const markFilledControls = (root: ParentNode): void =>
  querySelectorAll<HTMLInputElement>(".form-control", root).forEach((input) => {
    if (input.value) input.parentElement?.classList.add("has-value");
  });

/**
 * Focus and value markers on `.form-control` parents, loading submit buttons
 *
 * @returns Function removing the listeners
 */
export const initForms = (doc: Document): () => void => {
  markFilledControls(doc);
  const subs = [
    listen(doc, "focusin", ({ target }) => {
      if (isFormControl(target)) {
        target.parentElement?.classList.add("focused");
      }
    }),
    listen(doc, "focusout", ({ target }) => {
      if (isFormControl(target)) {
        const parent = target.parentElement;
        parent?.classList.remove("focused");
        parent?.classList.toggle("has-value", !!target.value);
      }
    }),
    listen(doc, "submit", ({ target }) => {
      if (!isElement(target) || target.tagName !== "FORM") return;
      const button = querySelector<HTMLButtonElement>(
        'button[type="submit"], input[type="submit"]',
        target,
      );
      if (button && !button.disabled) setButtonLoading(button, true);
    }),
  ];
  return () => subs.forEach((unsub) => unsub());
};
