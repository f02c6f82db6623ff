import { collisionChart } from "../format/collision-chart.js";
import { computeMetrics } from "../state/metrics.js";
import { readEvents } from "../state/read-events.js";
import { commandParser, loadCommandContext, printJson } from "./context.js";

const formatRatio = ({ value }: { value: number }): string => value.toFixed(3);

export const runMetrics = async ({ args }: { args: string[] }): Promise<number> => {
  const { paths } = await loadCommandContext();
  const parsed = commandParser({ args, scriptName: "lockstep metrics" })
    .option("json", { type: "boolean", default: false })
    .parseSync();
  const metrics = computeMetrics({ events: await readEvents({ eventsLog: paths.eventsLog }), nowMs: Date.now() });
  if (parsed.json) {
    printJson({ value: metrics });
    return 0;
  }
  console.log(`collisionRate=${formatRatio({ value: metrics.collisionRate })}`);
  console.log(`acquires=${metrics.acquires}`);
  console.log(`blocked=${metrics.blocked}`);
  console.log(`deadlocksResolved=${metrics.deadlocksResolved}`);
  console.log(
    `meanResolutionMs=${metrics.meanResolutionMs === null ? "-" : Math.round(metrics.meanResolutionMs)}`,
  );
  console.log(`preemptions=${metrics.preemptions}`);
  console.log(`expired=${metrics.expired}`);
  console.log(`reaped=${metrics.reaped}`);
  console.log(`tasksCompleted=${metrics.tasksCompleted}`);
  console.log(`tasksRequeued=${metrics.tasksRequeued}`);
  console.log(`tasksFailed=${metrics.tasksFailed}`);
  for (const agent of metrics.agents) {
    console.log(`utilization.${agent.agentId}=${formatRatio({ value: agent.utilization })}`);
  }
  const peak = Math.max(0, ...metrics.collisionHistory);
  if (peak > 0) {
    console.log(`collisions=${collisionChart({ counts: metrics.collisionHistory })} peak=${peak}`);
  }
  return 0;
};
