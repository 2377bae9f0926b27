export { formatFailure, formatSum, printSum, reportFailure } from "./report.js";
