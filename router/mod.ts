export { PageCache } from "./cache.ts";
export {
  defaultInterceptOptions,
  type InterceptOptions,
  type LinkInfo,
  matchSection,
  type SectionTable,
  sections,
  shouldIntercept,
} from "./policy.ts";
export {
  defaultRouterOptions,
  HttpError,
  navigationError,
  pageLoaded,
  Router,
  type RouterHost,
  type RouterOptions,
  type RouterState,
} from "./router.ts";
export { PageStructureError } from "./view.ts";
