export interface TextPart {
  kind: "text";
  text: string;
}

export interface DataPart {
  kind: "data";
  data?: unknown;
}

export interface FilePart {
  kind: "file";
  file: Record<string, unknown>;
}

export type Part = TextPart | DataPart | FilePart;

export type MessageRole = "user" | "agent";

export interface Message {
  kind: "message";
  role: MessageRole;
  parts: Part[];
  messageId: string;
  taskId?: string;
  contextId?: string;
}

export interface PushNotificationConfig {
  url: string;
  token: string;
}

export interface ExecutionConfiguration {
  blocking: boolean;
  pushNotificationConfig?: PushNotificationConfig;
}

export type TaskState = "working" | "completed" | "failed";

export interface TaskStatus {
  state: TaskState;
  message?: Message;
  timestamp: string;
}

export interface Artifact {
  artifactId: string;
  name: string;
  parts: Part[];
}

export interface TaskResult {
  kind: "task";
  id: string;
  contextId: string;
  status: TaskStatus;
  artifacts?: Artifact[];
  history?: Message[];
}
