export {
  type AppContext,
  type ContextOptions,
  createContext,
  featureSurface,
  navigationSurface,
  startApp,
} from "./context.ts";
