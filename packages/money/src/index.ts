export { Decimal, sumDecimals } from "./decimal.js";
