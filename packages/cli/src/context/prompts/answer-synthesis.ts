const MAX_PAYLOAD_CHARS = 8000;

export const ANSWER_SYNTHESIS_PROMPT = `You answer the user's question using data a tool has already fetched.
Rules:
- Answer in plain text, briefly and directly.
- Use only the data provided. Do not invent fields.
- Do not output JSON and do not mention tools.`;

export function renderPayload(payload: unknown): string {
  const json = JSON.stringify(payload, null, 2) ?? 'null';
  return json.length > MAX_PAYLOAD_CHARS ? `${json.slice(0, MAX_PAYLOAD_CHARS)}\n[truncated]` : json;
}

export function buildSynthesisRequest(query: string, toolName: string, payload: unknown): string {
  return `Question: ${query}

Data returned by ${toolName}:
${renderPayload(payload)}`;
}
