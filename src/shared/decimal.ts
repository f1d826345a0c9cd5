/**
 * Decimal facade. All prices, sizes and balances in the domain are Decimals.
 */
export { LibDecimal as Decimal } from "../lib/decimal/index.js";
