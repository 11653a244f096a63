/**
 * Pipeline managers: bootstrap, wiring and teardown of one symbol's
 * replication pipelines.
 */

export { OrderBookManager, type OrderBookManagerStats } from "./OrderBookManager.js";
export { PriceManager, priceFromSnapshot, type PriceManagerStats } from "./PriceManager.js";
export { UpdateStreamManager, ControlledReceiver } from "./UpdateStreamManager.js";
export type { PipelineDeps } from "./types.js";
