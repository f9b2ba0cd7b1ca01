import { User } from '../types/User';

/**
 * Membership test against the configured admin chat ids.
 * The set is copied at construction, so later changes to the source list have no effect.
 */
export class AdminPolicy {
    private readonly adminChatIds: ReadonlySet<string>;

    constructor(adminChatIds: Iterable<string>) {
        this.adminChatIds = new Set(adminChatIds);
    }

    isAdmin(user: Pick<User, 'chatId'>): boolean {
        return this.adminChatIds.has(user.chatId);
    }

    isAdminChat(chatId: string): boolean {
        return this.adminChatIds.has(chatId);
    }

    chatIds(): string[] {
        return [...this.adminChatIds];
    }
}
