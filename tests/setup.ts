import { setLogLevel } from "../src/utils/logger";

// Keep test output readable; individual tests raise the level when they assert on logs
setLogLevel("error");
