export * from "./html-report.js";
export * from "./report-file.js";
export * from "./browser.js";
