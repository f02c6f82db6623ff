export const getCliHelp = (): string => `lockstep — file-based coordination for concurrent agents

Usage:
  lockstep [--config <path>] <command> [options]

Commands:
  init                                   write lockstep.yaml and the state directory
  acquire <resource> --agent <id>        [--mode read|write|exclusive] [--priority n] [--ttl ms] [--wait ms] [--pid n]
                                         a refused attempt registers no wait unless --wait ms > 0 or --keep-wait
  renew <ticket>                         [--ttl ms]
  release <resource> --agent <id>        or: release --ticket <id>
  locks                                  [--json]
  status                                 [--json]
  metrics                                [--json]
  tail                                   [--limit n] [--no-follow]
  register <agent>                       [--pid n]
  heartbeat <agent>                      [--state idle|working|blocked] [--task id] [--clear-task] [--queue-depth n] [--avg-ms n]
  task <subcommand>                      enqueue | claim | complete | fail | touch | list | failed | retry
  detect                                 run one deadlock detector pass
  reap                                   run one reaper pass
  route                                  run one router pass
  daemon                                 run detector, reaper and router until interrupted

Options:
  --config <path>                        use another config file
  -h, --help

Exit codes:
  0 ok, 1 error, 2 blocked, preempted, not claimed or crashed
`;
