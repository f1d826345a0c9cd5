export { calculateIbs, determineLeverage, type PriceRange } from "./ibs.js";
export {
	DecisionProcess,
	type DecisionConfig,
	type DecisionProcessDeps,
	type SignalRunner,
	type TradeState,
} from "./decision-process.js";
