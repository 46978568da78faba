import Bottleneck from "bottleneck";

// Every navigation, reload and pagination click goes through here: one at a
// time, never closer than minTime apart.
export const limiter = new Bottleneck({
  minTime: 1200,
  maxConcurrent: 1
});
