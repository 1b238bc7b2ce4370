export type { Instrument } from "./instrument";
export { PricingStrategy } from "./pricingStrategy";
export { EuropeanOption, validateTerms } from "./europeanOption";
export type { EuropeanOptionOptions } from "./europeanOption";
export { AnalyticBlackScholes, blackScholes } from "./analyticBlackScholes";
export type { BlackScholesInputs, BlackScholesResult, AnalyticBlackScholesOptions } from "./analyticBlackScholes";
export { erf, normCdf, normPdf } from "./normal";
