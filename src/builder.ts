import { BuildFailure } from './errors.js';
import { formatLine } from './parser.js';
import { ArenaTree, NodeId } from './tree.js';
import { Command, Document, Element, Marker, assertNever } from './types.js';

/**
 * Marker name -> node of the first command after the marker.
 * `null` marks a marker with nothing after it (usually END).
 */
export type MarkerTable = Map<string, NodeId | null>;

export interface BuiltTree {
  tree: ArenaTree<Command>;
  markers: MarkerTable;
  /** First command in document order, undefined for a script with no commands */
  first: NodeId | undefined;
}

interface BuildState {
  tree: ArenaTree<Command>;
  markers: MarkerTable;
  pendingMarker: Marker | null;
}

/**
 * Walk one indentation level. `parent` is the node every command at this level hangs
 * from (undefined at the top level).
 */
function buildLevel(state: BuildState, elements: Element[], parent: NodeId | undefined): void {
  // Last command node created at this level, reset by a marker
  let lastNode: NodeId | undefined;

  for (const element of elements) {
    switch (element.kind) {
      case 'command': {
        const id = parent === undefined
          ? state.tree.push(element)
          : state.tree.pushWithParent(element, parent);
        if (state.pendingMarker) {
          state.markers.set(state.pendingMarker.name, id);
          state.pendingMarker = null;
        }
        lastNode = id;
        break;
      }
      case 'marker': {
        if (state.pendingMarker) {
          throw new BuildFailure(
            `Marker ${formatLine(element)} directly follows ${formatLine(state.pendingMarker)} with no command between them`
          );
        }
        state.pendingMarker = element;
        lastNode = undefined;
        break;
      }
      case 'block':
        // A block under a command nests beneath it; a block under a marker is plain grouping
        buildLevel(state, element.elements, lastNode ?? parent);
        break;
      case 'comment':
        break;
      default:
        assertNever(element);
    }
  }
}

/**
 * Flatten a document into an arena tree of commands plus the marker lookup table.
 */
export function buildTree(document: Document): BuiltTree {
  const state: BuildState = {
    tree: new ArenaTree<Command>(),
    markers: new Map(),
    pendingMarker: null
  };

  buildLevel(state, document.elements, undefined);

  if (state.pendingMarker) {
    state.markers.set(state.pendingMarker.name, null);
  }

  return {
    tree: state.tree,
    markers: state.markers,
    first: state.tree.first()
  };
}
