export * from "./alerts.ts";
export * from "./forms.ts";
export * from "./notify.ts";
export * from "./scroll.ts";
export * from "./search.ts";
export * from "./sidebar.ts";
export * from "./table.ts";
export * from "./theme.ts";
export * from "./widgets.ts";
