import { escapeHtml, listen, querySelector } from "../util/util.ts";
import { type FeatureHost, redirectToLogin } from "./host.ts";
import { closeModal, openModal, showModalError } from "./modal.ts";

export type ReportType = "profile" | "call";

export const reportReasons = [
  ["fake_data", "Fake or Manipulated Data"],
  ["spam", "Spam or Promotional Content"],
  ["manipulation", "Market Manipulation"],
  ["misleading", "Misleading Information"],
  ["duplicate", "Duplicate Profile"],
  ["offensive", "Offensive Content"],
  ["scam", "Potential Scam"],
  ["other", "Other"],
] as const;

export const requiredFieldsError = "Please fill in all required fields";

/** @returns Error to display, or `null` when the report can be sent */
export const validateReport = (
  reason: string,
  description: string,
): string | null => (!reason || !description.trim() ? requiredFieldsError : null);

export const reportPayload = (
  type: ReportType,
  id: number,
  reason: string,
  description: string,
): Record<string, unknown> => ({
  report_type: type,
  reason,
  description,
  [type === "profile" ? "influencer_id" : "trade_call_id"]: id,
});

export class AbuseReports {
  readonly #host: FeatureHost;

  constructor(host: FeatureHost) {
    this.#host = host;
  }

  open(type: ReportType, id: number, name: string): HTMLElement {
    const dialog = openModal(this.#host.win, {
      title: `Report ${type === "profile" ? "Influencer" : "Signal"}`,
      body: `<p class="text-muted">Reporting: <strong>${
        escapeHtml(name)
      }</strong></p><div class="mb-3"><label class="form-label">Reason *</label><select class="form-control" id="report-reason"><option value="">Select a reason...</option>${
        reportReasons
          .map(([value, label]) => `<option value="${value}">${label}</option>`)
          .join("")
      }</select></div><div class="mb-3"><label class="form-label">Description *</label><textarea class="form-control" id="report-description" rows="4" placeholder="Please provide details about your report..."></textarea></div><div id="report-error" class="alert alert-danger d-none"></div>`,
      footer:
        '<button class="btn btn-secondary" data-modal-close>Cancel</button><button class="btn btn-danger" data-report-submit>Submit Report</button>',
    });

    const submit = querySelector("[data-report-submit]", dialog);
    if (submit) {
      listen(submit, "click", () => {
        this.submit(type, id).catch((e: unknown) =>
          this.#host.log.error("Error submitting report:", e)
        );
      });
    }
    return dialog;
  }

  close(): void {
    closeModal(this.#host.win.document);
  }

  /** Validate and send the open report dialog */
  async submit(type: ReportType, id: number): Promise<boolean> {
    const host = this.#host,
      doc = host.win.document,
      reason = querySelector<HTMLSelectElement>("#report-reason", doc)?.value ??
        "",
      description =
        querySelector<HTMLTextAreaElement>("#report-description", doc)
          ?.value ?? "",
      errorSlot = querySelector("#report-error", doc),
      invalid = validateReport(reason, description);

    if (invalid) {
      showModalError(errorSlot, invalid);
      return false;
    }

    if (!host.config.authenticated) {
      host.notifier.notify("Please login to report", "warning");
      this.close();
      redirectToLogin(host);
      return false;
    }

    const res = await host.api.request(
      "POST",
      "/report/",
      "Failed to submit report",
      reportPayload(type, id, reason, description),
    );
    if (!res.ok) {
      showModalError(errorSlot, res.error);
      return false;
    }

    this.close();
    host.notifier.notify("Report submitted successfully. Thank you!", "success");
    return true;
  }
}
