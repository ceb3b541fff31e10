import { createLogger } from "@matchproof/core";

const log = createLogger("ledger");

export default log;
