import type { BusinessInfo, ConversationTurn } from '../types/index.js';

export const ESCALATION_REPLY =
  "That's a great question! Let me check with my manager to get you the most accurate information. " +
  "I'll text you the answer within a few minutes. Is there anything else I can help you with right now?";

export const GENERATION_FAILURE_REPLY = "I apologize, I'm having trouble right now. Could you please try again?";

export const ESCALATION_FAILURE_REPLY =
  "I'm sorry, I couldn't pass your question along just now. Please call back a little later and we'll get you an answer.";

/**
 * System prompt: business facts followed by the learned-knowledge block
 */
export function buildSystemPrompt(business: BusinessInfo, knowledgeContext: string): string {
  return `You are a professional AI receptionist for ${business.name}.

BUSINESS INFORMATION:
- Name: ${business.name}
- Hours: ${business.hours}
- Phone: ${business.phone}
- Services: ${business.services}
- Pricing: ${business.pricing}
- Location: ${business.location}

${knowledgeContext}

YOUR ROLE:
You are a friendly, professional receptionist. Greet callers warmly, answer questions about services, pricing, hours and location, and handle general inquiries. You cannot book appointments yourself.

CRITICAL INSTRUCTIONS:
- Be warm, professional, and concise
- If you know the answer from the business information or learned knowledge above, answer confidently
- If you DON'T know something, DO NOT make it up or guess
- Keep responses under 3 sentences when possible
- Never hallucinate information

WHEN TO ESCALATE:
Escalate to your supervisor if asked about:
- Specific stylist availability or schedules
- Complex pricing for custom services
- Special requests or accommodations
- Complaints or issues
- Anything you're unsure about

Remember: It's better to admit you don't know than to provide wrong information!`;
}

/**
 * One-word YES/NO question put to the classifier
 */
export function buildEscalationCheckPrompt(question: string): string {
  return `Based on the business information and learned knowledge provided in your system context, can you confidently answer this customer question?

Question: "${question}"

Answer with ONLY one word:
- "YES" if you can answer this confidently with the information you have
- "NO" if you need supervisor help because you don't have enough information

Remember:
- If the question is about hours, pricing, services, location from the business info → YES
- If the question matches learned knowledge → YES
- If asking for specific stylist schedules, complex custom pricing, or something not in your knowledge → NO
- Unclear or gibberish questions → NO

One word answer:`;
}

export function buildSupervisorAlert(question: string, callerContact: string, requestId: string): string {
  return `🔔 New Help Request

Request: ${requestId}

Question: ${question}

Caller: ${callerContact}

The AI needs your help to answer this question. Please respond through the supervisor dashboard.`;
}

export function buildCallerFollowUp(question: string, answer: string): string {
  return `Hi! Thanks for your patience. Here's the answer to your question:

Question: ${question}

Answer: ${answer}

Is there anything else I can help you with? Feel free to call us back at any time!`;
}

/**
 * Render turns as `Customer:` / `Assistant:` lines
 */
export function renderTurns(turns: ReadonlyArray<ConversationTurn>): string {
  return turns
    .map(turn => `${turn.role === 'user' ? 'Customer' : 'Assistant'}: ${turn.text}`)
    .join('\n');
}
