import { ChatBedrockConverse } from '@langchain/aws';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { AIMessage, HumanMessage, SystemMessage, type BaseMessage, type MessageContent } from '@langchain/core/messages';
import { UpstreamUnavailableError, describeError } from './errors.js';
import { buildEscalationCheckPrompt } from './prompts.js';
import { parseVerdict, type EscalationVerdict } from './verdict.js';
import type { ConversationTurn, RuntimeConfig } from '../types/index.js';

/**
 * Decides whether a question can be answered from the system context, and
 * produces answers when it can.
 */
export interface EscalationOracle {
  /** @throws UpstreamUnavailableError when the model fails or its verdict is unrecognised */
  classify(systemContext: string, question: string): Promise<EscalationVerdict>;
  generate(systemContext: string, turns: ReadonlyArray<ConversationTurn>): Promise<string>;
}

export interface BedrockEscalationOracleOptions {
  classifier?: BaseChatModel;
  responder?: BaseChatModel;
}

/**
 * Flatten LangChain message content into plain text
 */
export function contentToText(content: MessageContent): string {
  if (typeof content === 'string') {
    return content;
  }

  return content
    .map(part => ('text' in part && typeof part.text === 'string' ? part.text : ''))
    .join('');
}

/**
 * EscalationOracle on Bedrock chat models. The classifier runs cold and short
 * (one-word YES/NO); the responder is allowed a short conversational reply.
 */
export class BedrockEscalationOracle implements EscalationOracle {
  private classifier: BaseChatModel;
  private responder: BaseChatModel;

  constructor(config: RuntimeConfig, options: BedrockEscalationOracleOptions = {}) {
    this.classifier = options.classifier ?? new ChatBedrockConverse({
      model: config.classifierModelId ?? config.bedrockModelId,
      region: config.awsRegion,
      temperature: 0.1,
      maxTokens: 10,
    });

    this.responder = options.responder ?? new ChatBedrockConverse({
      model: config.bedrockModelId,
      region: config.awsRegion,
      temperature: 0.7,
      maxTokens: 150,
    });
  }

  async classify(systemContext: string, question: string): Promise<EscalationVerdict> {
    const raw = await this.invoke(this.classifier, [
      new SystemMessage(systemContext),
      new HumanMessage(buildEscalationCheckPrompt(question)),
    ], 'Escalation classifier');

    const verdict = parseVerdict(raw);
    console.log(`🤔 Escalation check: ${raw.trim()} → ${verdict}`);
    return verdict;
  }

  async generate(systemContext: string, turns: ReadonlyArray<ConversationTurn>): Promise<string> {
    const messages: BaseMessage[] = [new SystemMessage(systemContext)];
    for (const turn of turns) {
      messages.push(turn.role === 'user' ? new HumanMessage(turn.text) : new AIMessage(turn.text));
    }

    const reply = (await this.invoke(this.responder, messages, 'Responder')).trim();
    if (!reply) {
      throw new UpstreamUnavailableError('Responder returned an empty reply');
    }
    return reply;
  }

  private async invoke(model: BaseChatModel, messages: BaseMessage[], label: string): Promise<string> {
    try {
      const response = await model.invoke(messages);
      return contentToText(response.content);
    } catch (error) {
      throw new UpstreamUnavailableError(`${label} call failed: ${describeError(error)}`, { cause: error });
    }
  }
}
