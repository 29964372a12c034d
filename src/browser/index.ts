export { Browser } from "./browser";
export { BrowserContext } from "./browser-context";
export { Page, PageCloseOptions } from "./page";
export {
  NetworkRequest,
  NetworkResponse,
  UrlOrPredicate,
  requestMatcher,
  responseMatcher,
} from "./network";
