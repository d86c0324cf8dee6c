import { ChatTurn } from '../types';

export class ChatHistory {
  private readonly turns: ChatTurn[];

  constructor(initial: readonly ChatTurn[] = []) {
    this.turns = initial.map(turn => ({ ...turn }));
  }

  get size(): number {
    return this.turns.length;
  }

  append(turn: ChatTurn): void {
    this.turns.push({ ...turn });
  }

  history(): ChatTurn[] {
    return this.turns.map(turn => ({ ...turn }));
  }

  reset(): void {
    this.turns.length = 0;
  }
}
