import { EventEmitter } from 'eventemitter3';
import type { RightsizerEvents } from './types.js';

export class EventBus {
  private emitter = new EventEmitter();

  on<K extends keyof RightsizerEvents>(event: K, listener: (data: RightsizerEvents[K]) => void): void {
    this.emitter.on(event, listener);
  }

  off<K extends keyof RightsizerEvents>(event: K, listener: (data: RightsizerEvents[K]) => void): void {
    this.emitter.off(event, listener);
  }

  once<K extends keyof RightsizerEvents>(event: K, listener: (data: RightsizerEvents[K]) => void): void {
    this.emitter.once(event, listener);
  }

  emit<K extends keyof RightsizerEvents>(event: K, data: RightsizerEvents[K]): void {
    this.emitter.emit(event, data);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
