import type { SnapshotFetcher } from "../binance/client.js";
import type { FeedConnector } from "../stream/StreamWorker.js";

/**
 * Collaborators a pipeline talks to. Defaults are the live Binance adapters.
 */
export interface PipelineDeps {
    /** REST snapshot source. Default: undici against config.restBaseUrl. */
    fetchSnapshot?: SnapshotFetcher;

    /** Socket factory for stream workers. Default: ws. */
    connect?: FeedConnector;
}
