import { createLogger } from "@matchproof/core";

const log = createLogger("server");

export default log;
