import { jumpTarget, isJump } from './commands.js';
import { DialogueEngine } from './engine.js';
import { NotFound, UnknownMarker } from './errors.js';
import { LoadedScript } from './loader.js';
import { PresentedChoice, PresentedLine, presentChoices, presentCommand } from './renderer.js';
import { createUidGenerator } from './uid.js';

/**
 * What one tick produced, ready for display
 */
export interface StepResult {
  step: number;
  lines: PresentedLine[];
  /** Options to pick from before the next tick; empty when none is pending */
  choices: PresentedChoice[];
  finished: boolean;
}

export interface SessionView {
  sessionId: string;
  scriptId: string;
  finished: boolean;
  choices: PresentedChoice[];
  /** Ticks taken so far */
  step: number;
}

/**
 * One playthrough of one script. Jumps are followed as soon as they are emitted.
 */
export class Session {
  private readonly engine: DialogueEngine;

  constructor(public readonly sessionId: string, public readonly script: LoadedScript) {
    this.engine = new DialogueEngine(script.built);
  }

  get scriptId(): string {
    return this.script.scriptId;
  }

  get finished(): boolean {
    return this.engine.isFinished;
  }

  private choices(): PresentedChoice[] {
    const pending = this.engine.pendingChoices;
    return pending ? presentChoices(pending) : [];
  }

  step(): StepResult {
    const { number, commands } = this.engine.tick();

    for (const command of commands) {
      if (isJump(command)) {
        const target = jumpTarget(command);
        if (target === undefined) {
          throw new UnknownMarker(command.suffix ?? '');
        }
        this.engine.goto(target);
      }
    }

    return {
      step: number,
      lines: commands.map(presentCommand),
      choices: this.choices(),
      finished: this.engine.isFinished
    };
  }

  choose(index: number): SessionView {
    this.engine.choose(index);
    return this.view();
  }

  goto(markerName: string): SessionView {
    this.engine.goto(markerName);
    return this.view();
  }

  view(): SessionView {
    return {
      sessionId: this.sessionId,
      scriptId: this.scriptId,
      finished: this.engine.isFinished,
      choices: this.choices(),
      step: this.engine.tickCount
    };
  }
}

/**
 * In-memory sessions by id. Nothing survives a restart.
 */
export class SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly nextId: () => string;

  constructor(nextId: () => string = createUidGenerator()) {
    this.nextId = nextId;
  }

  get size(): number {
    return this.sessions.size;
  }

  create(script: LoadedScript): Session {
    const session = new Session(this.nextId(), script);
    this.sessions.set(session.sessionId, session);
    return session;
  }

  get(sessionId: string): Session {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new NotFound(`Session not found: ${sessionId}`);
    }
    return session;
  }

  delete(sessionId: string): void {
    if (!this.sessions.delete(sessionId)) {
      throw new NotFound(`Session not found: ${sessionId}`);
    }
  }
}
