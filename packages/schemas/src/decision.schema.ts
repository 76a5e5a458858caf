/**
 * Shape of one structured-chat step emitted by a language model:
 * `{"thought": "...", "action": "<capability or final_answer>", "action_input": ...}`.
 */
export const DecisionOutputSchema = {
  type: "object",
  required: ["action", "action_input"],
  properties: {
    thought: { type: "string" },
    action: { type: "string", minLength: 1, maxLength: 64 },
    action_input: {},
  },
  additionalProperties: true,
} as const;

export const FINAL_ANSWER_ACTION = "final_answer";
