import { buildTree, BuiltTree, MarkerTable } from './builder.js';
import { isChoice } from './commands.js';
import { ChoiceOutOfRange, IllegalState, UnknownMarker } from './errors.js';
import { ArenaTree, NodeId } from './tree.js';
import { Command, Document, assertNever } from './types.js';

/**
 * Where a pending choice came from.
 * - "menu": the children of the emitted line, led by a CHOICE. Choosing moves to the chosen
 *   CHOICE line, which the next tick emits before entering its block.
 * - "group": a run of CHOICE siblings reached in sequence. The first was just emitted, so
 *   choosing enters the chosen option's block directly.
 */
export type ChoiceSource = 'menu' | 'group';

export type ExecutionState =
  | { kind: 'awaitingTick'; node: NodeId; selected: boolean }
  | { kind: 'awaitingChoice'; options: readonly NodeId[]; source: ChoiceSource }
  | { kind: 'done' };

/**
 * The result of one tick. `commands` is empty once the script has finished.
 */
export interface Tick {
  number: number;
  commands: Command[];
}

/**
 * Runs one playthrough of a script.
 *
 * Call `tick()` to get the next line. When a tick leaves the engine at a choice point,
 * `pendingChoices` lists the options and `choose(index)` must be called before ticking
 * again. `goto(marker)` jumps anywhere, including out of a pending choice.
 */
export class DialogueEngine {
  private readonly tree: ArenaTree<Command>;
  private readonly markerTable: MarkerTable;
  private current: ExecutionState;
  private count = 0;

  constructor(built: BuiltTree) {
    this.tree = built.tree;
    this.markerTable = built.markers;
    this.current = built.first === undefined
      ? { kind: 'done' }
      : { kind: 'awaitingTick', node: built.first, selected: false };
  }

  static fromDocument(document: Document): DialogueEngine {
    return new DialogueEngine(buildTree(document));
  }

  get state(): ExecutionState {
    return this.current;
  }

  get isFinished(): boolean {
    return this.current.kind === 'done';
  }

  /** Number of ticks that emitted a command so far */
  get tickCount(): number {
    return this.count;
  }

  /** Option commands while a choice is pending, otherwise undefined */
  get pendingChoices(): Command[] | undefined {
    if (this.current.kind !== 'awaitingChoice') {
      return undefined;
    }
    return this.current.options.map(id => this.command(id));
  }

  get markers(): string[] {
    return Array.from(this.markerTable.keys());
  }

  hasMarker(name: string): boolean {
    return this.markerTable.has(name);
  }

  tick(): Tick {
    const state = this.current;
    switch (state.kind) {
      case 'done':
        return { number: this.count, commands: [] };
      case 'awaitingChoice':
        throw new IllegalState('A choice must be made before tick can be called again');
      case 'awaitingTick': {
        const number = this.count;
        this.count += 1;
        const emitted = this.command(state.node);
        this.current = this.stateAfter(state.node, emitted, state.selected);
        return { number, commands: [emitted] };
      }
      default:
        return assertNever(state);
    }
  }

  choose(index: number): void {
    const state = this.current;
    switch (state.kind) {
      case 'awaitingTick':
        throw new IllegalState('A choice may not be made until one is presented');
      case 'done':
        throw new IllegalState('A choice may not be made after the script has ended');
      case 'awaitingChoice': {
        if (!Number.isInteger(index) || index < 0 || index >= state.options.length) {
          throw new ChoiceOutOfRange(index, state.options.length);
        }
        const option = state.options[index];
        if (state.source === 'menu') {
          this.current = { kind: 'awaitingTick', node: option, selected: true };
        } else {
          const [firstChild] = this.tree.childrenOf(option);
          this.current = firstChild === undefined
            ? this.positionAt(this.successor(option))
            : { kind: 'awaitingTick', node: firstChild, selected: false };
        }
        return;
      }
      default:
        assertNever(state);
    }
  }

  goto(markerName: string): void {
    const target = this.markerTable.get(markerName);
    if (target === undefined) {
      throw new UnknownMarker(markerName);
    }
    this.current = target === null ? { kind: 'done' } : this.positionAt(target);
  }

  private command(id: NodeId): Command {
    const data = this.tree.getById(id);
    if (!data) {
      throw new Error(`No tree node with id ${id}`);
    }
    return data;
  }

  private positionAt(node: NodeId | undefined): ExecutionState {
    return node === undefined ? { kind: 'done' } : { kind: 'awaitingTick', node, selected: false };
  }

  private stateAfter(node: NodeId, emitted: Command, selected: boolean): ExecutionState {
    if (isChoice(emitted) && !selected) {
      return { kind: 'awaitingChoice', options: this.choiceGroup(node), source: 'group' };
    }

    const children = this.tree.childrenOf(node);
    if (children.length > 0) {
      if (isChoice(this.command(children[0]))) {
        return { kind: 'awaitingChoice', options: children, source: 'menu' };
      }
      return { kind: 'awaitingTick', node: children[0], selected: false };
    }

    return this.positionAt(this.successor(node));
  }

  /** The run of consecutive CHOICE siblings starting at `node` */
  private choiceGroup(node: NodeId): NodeId[] {
    const group = [node];
    let sibling = this.tree.nextSiblingOf(node);
    while (sibling !== undefined && isChoice(this.command(sibling))) {
      group.push(sibling);
      sibling = this.tree.nextSiblingOf(sibling);
    }
    return group;
  }

  /**
   * Where to continue once `node` and everything beneath it is finished. Like
   * `tree.next`, except that leaving a CHOICE also leaves the alternatives beside it.
   */
  private successor(node: NodeId): NodeId | undefined {
    let current: NodeId | undefined = node;
    while (current !== undefined) {
      let sibling = this.tree.nextSiblingOf(current);
      if (isChoice(this.command(current))) {
        while (sibling !== undefined && isChoice(this.command(sibling))) {
          sibling = this.tree.nextSiblingOf(sibling);
        }
      }
      if (sibling !== undefined) {
        return sibling;
      }
      current = this.tree.parentOf(current);
    }
    return undefined;
  }
}
