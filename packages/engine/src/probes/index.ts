import type { ExecutorRegistry } from "./types.js";
import { headerFetchExecutor, httpExistenceExecutor, pathProbeExecutor } from "./http.js";
import { tcpConnectExecutor } from "./tcp.js";

export const defaultExecutors: ExecutorRegistry = {
  "http-existence": httpExistenceExecutor,
  "tcp-connect": tcpConnectExecutor,
  "header-fetch": headerFetchExecutor,
  "path-probe": pathProbeExecutor,
};
