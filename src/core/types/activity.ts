export type ActivityEventKind =
  | { type: "fileRead"; path: string }
  | { type: "commandRun"; command: string }
  | { type: "agentStatus"; status: string };

export interface ActivityEvent {
  timestamp: Date;
  kind: ActivityEventKind;
}
