export {
  defaultApiBase,
  getCookie,
  type PageConfig,
  readPageConfig,
} from "./config.ts";
