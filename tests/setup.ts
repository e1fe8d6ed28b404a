import { setLogLevel } from "../server/logger";

// Keep test output to failures
setLogLevel("error");
