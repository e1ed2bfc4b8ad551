import type { StatRecord } from "./stats.js";
import type { BreakerStatus } from "./types.js";

export interface BreakerSnapshot extends StatRecord {
  identity: string;
  status: BreakerStatus;
  enabled: boolean;
  requestsSentToService: number;
  successRatio: number;
  failureRatio: number;
}
