import { createLogger } from "@stakevest/ledger";

export const logger = createLogger("keeper");
