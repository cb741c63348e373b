import {
  isNumber,
  isRecord,
  listen,
  querySelector,
} from "../util/util.ts";
import type { FeatureHost } from "./host.ts";
import { closeModal, openModal, showModalError } from "./modal.ts";

export type SimulationResults = {
  readonly final_value: number;
  readonly total_return_pct: number;
  readonly total_calls: number;
  readonly success_rate: number;
  readonly avg_win: number;
  readonly avg_loss: number;
};

export type Simulation = {
  readonly simulation_parameters: {
    readonly initial_budget: number;
    readonly period_days?: number;
  };
  readonly results: SimulationResults;
};

export const simulationPeriods = [7, 30, 60, 90] as const;

/** Narrow a simulation response, `null` when a figure is missing */
export const parseSimulation = (
  data: Record<string, unknown>,
): Simulation | null => {
  const { simulation_parameters: params, results } = data;
  if (!isRecord(params) || !isRecord(results)) return null;

  const { initial_budget, period_days } = params,
    {
      final_value,
      total_return_pct,
      total_calls,
      success_rate,
      avg_win,
      avg_loss,
    } = results;
  return isNumber(initial_budget) && isNumber(final_value) &&
      isNumber(total_return_pct) && isNumber(total_calls) &&
      isNumber(success_rate) && isNumber(avg_win) && isNumber(avg_loss)
    ? {
      simulation_parameters: {
        initial_budget,
        period_days: isNumber(period_days) ? period_days : undefined,
      },
      results: {
        final_value,
        total_return_pct,
        total_calls,
        success_rate,
        avg_win,
        avg_loss,
      },
    }
    : null;
};

/** Money amount with thousands separators */
export const formatAmount = (value: number): string =>
  value.toLocaleString("en-US");

/** Percentage carrying its sign, `+` for zero and above */
export const formatSignedPct = (pct: number): string =>
  `${pct >= 0 ? "+" : ""}${pct}%`;

/** Styling of a return, driven by its sign only */
export const returnStyle = (pct: number): {
  readonly className: "text-success" | "text-danger";
  readonly icon: "fa-arrow-up" | "fa-arrow-down";
} =>
  pct >= 0
    ? { className: "text-success", icon: "fa-arrow-up" }
    : { className: "text-danger", icon: "fa-arrow-down" };

export const renderSimulationResults = (
  { simulation_parameters, results: res }: Simulation,
): string => {
  const { className, icon } = returnStyle(res.total_return_pct);
  return `<div class="simulation-summary"><h6 class="mb-3">Simulation Results</h6><div class="row text-center mb-4"><div class="col-4"><div class="stat-card"><div class="stat-label">Initial Investment</div><div class="stat-value" data-sim="initial">$${
    formatAmount(simulation_parameters.initial_budget)
  }</div></div></div><div class="col-4"><div class="stat-card"><div class="stat-label">Final Value</div><div class="stat-value ${className}" data-sim="final">$${
    formatAmount(res.final_value)
  }</div></div></div><div class="col-4"><div class="stat-card"><div class="stat-label">Total Return</div><div class="stat-value ${className}" data-sim="return"><i class="fas ${icon}"></i> ${
    formatSignedPct(res.total_return_pct)
  }</div></div></div></div><div class="row text-center"><div class="col-3"><div class="stat-label">Total Calls</div><div class="stat-value-sm" data-sim="calls">${res.total_calls}</div></div><div class="col-3"><div class="stat-label">Success Rate</div><div class="stat-value-sm text-success" data-sim="success">${res.success_rate}%</div></div><div class="col-3"><div class="stat-label">Avg Win</div><div class="stat-value-sm text-success" data-sim="win">$${
    formatAmount(res.avg_win)
  }</div></div><div class="col-3"><div class="stat-label">Avg Loss</div><div class="stat-value-sm text-danger" data-sim="loss">$${
    formatAmount(Math.abs(res.avg_loss))
  }</div></div></div><div class="alert alert-info mt-3"><i class="fas fa-info-circle"></i> <small>This simulation assumes equal allocation per trade and is based on historical performance. Past performance does not guarantee future results.</small></div></div>`;
};

export class ReturnSimulator {
  readonly #host: FeatureHost;

  constructor(host: FeatureHost) {
    this.#host = host;
  }

  open(influencerId: number, name: string): HTMLElement {
    const dialog = openModal(this.#host.win, {
      title: `Simulate Returns - ${name}`,
      size: "modal-lg",
      body:
        `<div class="row mb-3"><div class="col-md-6"><label class="form-label">Initial Budget ($)</label><input type="number" class="form-control" id="sim-budget" value="1000" min="100" step="100"></div><div class="col-md-6"><label class="form-label">Time Period (days)</label><select class="form-control" id="sim-period">${
          simulationPeriods
            .map((days) =>
              `<option value="${days}"${
                days === 30 ? " selected" : ""
              }>Last ${days} days</option>`
            )
            .join("")
        }</select></div></div><button class="btn btn-primary w-100 mb-3" data-sim-run><i class="fas fa-calculator"></i> Calculate Returns</button><div id="simulation-loading" class="text-center d-none"><div class="spinner-border text-primary" role="status"><span class="visually-hidden">Loading...</span></div><p class="mt-2">Calculating...</p></div><div id="simulation-results" class="d-none"></div><div id="simulation-error" class="alert alert-danger d-none"></div>`,
    });

    const run = querySelector("[data-sim-run]", dialog);
    if (run) {
      listen(run, "click", () => {
        this.run(influencerId).catch((e: unknown) =>
          this.#host.log.error("Error running simulation:", e)
        );
      });
    }
    return dialog;
  }

  close(): void {
    closeModal(this.#host.win.document);
  }

  /** Run the simulation with the open dialog's inputs and show the outcome */
  async run(influencerId: number): Promise<Simulation | null> {
    const host = this.#host,
      doc = host.win.document,
      budget = parseFloat(
        querySelector<HTMLInputElement>("#sim-budget", doc)?.value ?? "",
      ),
      periodDays = parseInt(
        querySelector<HTMLSelectElement>("#sim-period", doc)?.value ?? "",
        10,
      ),
      loading = querySelector("#simulation-loading", doc),
      results = querySelector("#simulation-results", doc),
      errorSlot = querySelector("#simulation-error", doc);

    loading?.classList.remove("d-none");
    results?.classList.add("d-none");
    errorSlot?.classList.add("d-none");

    const res = await host.api.request(
      "POST",
      "/simulate/",
      "Failed to run simulation",
      { influencer_id: influencerId, budget, period_days: periodDays },
    );
    loading?.classList.add("d-none");

    const simulation = res.ok ? parseSimulation(res.data) : null;
    if (!simulation) {
      showModalError(
        errorSlot,
        res.ok ? "Failed to run simulation" : res.error,
      );
      return null;
    }

    if (results) {
      results.innerHTML = renderSimulationResults(simulation);
      results.classList.remove("d-none");
    }
    return simulation;
  }
}

