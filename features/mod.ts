export * from "./api.ts";
export * from "./host.ts";
export * from "./modal.ts";
export * from "./profile.ts";
export * from "./report.ts";
export * from "./simulation.ts";
export * from "./watchlist.ts";
