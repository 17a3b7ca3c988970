import { EventEmitter } from "node:events";

export const PROJECT_UPDATED = "project-updated";

export type ChangeTopic = typeof PROJECT_UPDATED;

export interface ChangeNotification {
  topic: ChangeTopic;
  projectId: string;
  emittedAt: Date;
}

export type ChangeListener = (notification: ChangeNotification) => void;

/**
 * In-process broadcast of "project-updated". Listeners re-read whatever they
 * display; the notification carries no state of its own.
 */
export class ChangeNotifier {
  private readonly emitter = new EventEmitter();

  emitChangeNotification(topic: ChangeTopic, projectId: string, emittedAt: Date = new Date()): void {
    console.log(`[NOTIFY] ${topic} ${projectId}`);
    this.emitter.emit(topic, { topic, projectId, emittedAt });
  }

  /** Returns an unsubscribe function. */
  subscribe(topic: ChangeTopic, listener: ChangeListener): () => void {
    this.emitter.on(topic, listener);
    return () => {
      this.emitter.off(topic, listener);
    };
  }

  listenerCount(topic: ChangeTopic): number {
    return this.emitter.listenerCount(topic);
  }
}

export const changeNotifier = new ChangeNotifier();
