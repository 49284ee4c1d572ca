export type AgentInput = {
  message: string;
  sessionId?: string;
};

export type AgentAction = {
  type: string;
  status?: 'pending' | 'done' | 'failed';
  payload?: Record<string, unknown>;
};

export type AgentOutput = {
  reply: string;
  actions?: AgentAction[];
  usageTotalTokens?: number;
};
