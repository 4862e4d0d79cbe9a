import { createEngineLogger } from "@plinth/engine";

export const logger = createEngineLogger("KEEPER");
