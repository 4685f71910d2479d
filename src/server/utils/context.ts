import type { Logger } from "pino";
import type { AppConfig } from "../../config/types";
import type { LLMClientBundle } from "../../llm/types";
import type { VectorIndex } from "../../database/types";
import { VectorRetriever, type Retriever } from "../../query/retriever";

export interface ServerContext {
    config: AppConfig;
    llm: LLMClientBundle;
    index: VectorIndex;
}

export interface RouterContext extends ServerContext {
    retriever: Retriever;
}

export function createRouterContext(context: ServerContext, logger?: Logger): RouterContext {
    return {
        ...context,
        retriever: new VectorRetriever({
            embedding: context.llm.embedding,
            index: context.index,
            collection: context.config.index.collection,
            logger,
        }),
    };
}
