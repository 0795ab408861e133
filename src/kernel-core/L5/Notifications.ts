import type { TokenEvent } from '../L0/Ontology.js';

export interface Notification {
    commandId: string;
    evidenceId: string;
    event: TokenEvent;
}

export type NotificationListener = (notification: Notification) => void;

/**
 * Fan-out of committed ledger events. Listeners run after the commit; a
 * throwing listener is logged and does not affect the others or the ledger.
 */
export class NotificationHub {
    private listeners: Set<NotificationListener> = new Set();

    public subscribe(listener: NotificationListener): () => void {
        this.listeners.add(listener);
        return () => { this.listeners.delete(listener); };
    }

    public publish(notification: Notification): void {
        for (const listener of this.listeners) {
            try {
                listener(notification);
            } catch (e) {
                console.warn(`[NotificationHub] Listener failed on ${notification.event.type}: ${e instanceof Error ? e.message : String(e)}`);
            }
        }
    }

    public get size(): number {
        return this.listeners.size;
    }
}
