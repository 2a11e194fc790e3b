import type { MessageSender } from "./broadcast";
import type { MembershipOracle } from "./membership-gate";
import type { MembershipStatus } from "./types";

/** The part of the MAX bot API this project talks to. */
export interface MaxApi {
  sendMessageToUser(userId: number, text: string): Promise<unknown>;
  getChatMembers(chatId: number, extra: { user_ids: number[] }): Promise<unknown>;
  editMessage(messageId: string, extra: { text: string }): Promise<unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function readMembers(response: unknown): Record<string, unknown>[] {
  if (!isRecord(response) || !Array.isArray(response.members)) {
    throw new Error("Malformed chat members response.");
  }
  return response.members.filter(isRecord);
}

export function toMembershipStatus(response: unknown, userId: number): MembershipStatus {
  const member = readMembers(response).find((candidate) => Number(candidate.user_id) === userId);
  if (!member) {
    return "left";
  }
  if (member.is_owner === true) {
    return "creator";
  }
  if (member.is_admin === true) {
    return "administrator";
  }
  return "member";
}

export function extractMessageId(message: unknown): string | undefined {
  if (!isRecord(message) || !isRecord(message.body)) {
    return undefined;
  }
  const mid = message.body.mid;
  return typeof mid === "string" && mid ? mid : undefined;
}

export class MaxGateway implements MessageSender, MembershipOracle {
  private readonly api: MaxApi;

  constructor(api: MaxApi) {
    this.api = api;
  }

  async sendText(userId: number, text: string): Promise<void> {
    await this.api.sendMessageToUser(userId, text);
  }

  async getMembershipStatus(chatId: number, userId: number): Promise<MembershipStatus> {
    const response = await this.api.getChatMembers(chatId, { user_ids: [userId] });
    return toMembershipStatus(response, userId);
  }

  async editText(messageId: string, text: string): Promise<void> {
    await this.api.editMessage(messageId, { text });
  }
}
