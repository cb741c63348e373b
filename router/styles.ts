import type { CSSRules } from "../util/util.ts";

export const overlayId = "spa-loading-overlay";

export const routerStyles: CSSRules = {
  [`#${overlayId}`]: {
    position: "fixed",
    top: 0,
    left: 0,
    width: "100%",
    height: "100%",
    background: "rgba(var(--bs-body-bg-rgb), 0.9)",
    backdropFilter: "blur(10px)",
    zIndex: "9999",
    display: "none",
    alignItems: "center",
    justifyContent: "center",
    transition: "all 0.3s ease",
  },
  ".loading-content": {
    textAlign: "center",
    color: "var(--bs-primary)",
  },
  ".loading-spinner": {
    position: "relative",
    width: 60,
    height: 60,
    margin: "0 auto 20px",
  },
  ".spinner-ring": {
    position: "absolute",
    width: "100%",
    height: "100%",
    border: "3px solid transparent",
    borderTop: "3px solid var(--bs-primary)",
    borderRadius: "50%",
    animation: "spa-spin 1.2s cubic-bezier(0.5, 0, 0.5, 1) infinite",
  },
  ".spinner-ring:nth-child(1)": { animationDelay: "-0.45s" },
  ".spinner-ring:nth-child(2)": { animationDelay: "-0.3s" },
  ".spinner-ring:nth-child(3)": { animationDelay: "-0.15s" },
  "@keyframes spa-spin": {
    "0%": { transform: "rotate(0deg)" },
    "100%": { transform: "rotate(360deg)" },
  },
  ".loading-text": { fontWeight: "500", fontSize: "1.1rem" },
  [`.dark-theme #${overlayId}`]: {
    background: "rgba(var(--dark-bg-primary-rgb), 0.9)",
  },
  ".page-content": { transition: "opacity 0.3s ease, transform 0.3s ease" },
  ".page-content.spa-page-exit": {
    opacity: "0",
    transform: "translateY(20px)",
  },
  ".page-content.spa-page-enter": { opacity: "1", transform: "translateY(0)" },
  ".nav-link.spa-loading": { opacity: "0.7", pointerEvents: "none" },
  "#sidebar.spa-updating": { animation: "spa-pulse 1s ease-in-out infinite" },
  "@keyframes spa-pulse": {
    "0%,100%": { opacity: "1" },
    "50%": { opacity: "0.85" },
  },
};
