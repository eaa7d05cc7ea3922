export type CommandParams = Record<string, unknown>;
export type CommandResult = Record<string, unknown>;

export interface RequestFrame {
  id: number;
  method: string;
  params: CommandParams;
  sessionId?: string;
}

export interface EventFrame {
  method: string;
  params: Record<string, unknown>;
  sessionId?: string;
}

export type EventHandler = (event: EventFrame) => void | Promise<void>;
