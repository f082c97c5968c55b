/**
 * Rope data structure with B-tree indexing over piece table pieces.
 *
 * Each node stores charCount, lineBreakCount and byteCount for its subtree,
 * so offset, line and byte lookups descend a single root-to-leaf path.
 * Inserts split overflowing nodes on the way back up; deletes drop emptied
 * children. Neither rebuilds the tree.
 */

import {
  MAX_PIECE_LENGTH,
  PieceTable,
  utf8Width,
} from './piece-table';
import type { PieceDescriptor } from './piece-table';

const MAX_CHILDREN = 32;
const SPLIT_SIZE = MAX_CHILDREN / 2;

interface LeafNode {
  kind: 'leaf';
  pieces: PieceDescriptor[];
  charCount: number;
  lineBreakCount: number;
  byteCount: number;
}

interface InternalNode {
  kind: 'internal';
  children: RopeNode[];
  charCount: number;
  lineBreakCount: number;
  byteCount: number;
}

type RopeNode = LeafNode | InternalNode;

function createLeaf(pieces: PieceDescriptor[]): LeafNode {
  const leaf: LeafNode = { kind: 'leaf', pieces, charCount: 0, lineBreakCount: 0, byteCount: 0 };
  updateNodeStats(leaf);
  return leaf;
}

function createInternal(children: RopeNode[]): InternalNode {
  const node: InternalNode = { kind: 'internal', children, charCount: 0, lineBreakCount: 0, byteCount: 0 };
  updateNodeStats(node);
  return node;
}

function updateNodeStats(node: RopeNode): void {
  let cc = 0, lbc = 0, bc = 0;
  if (node.kind === 'leaf') {
    for (const p of node.pieces) {
      cc += p.length;
      lbc += p.lineBreakCount;
      bc += p.byteLength;
    }
  } else {
    for (const c of node.children) {
      cc += c.charCount;
      lbc += c.lineBreakCount;
      bc += c.byteCount;
    }
  }
  node.charCount = cc;
  node.lineBreakCount = lbc;
  node.byteCount = bc;
}

/** Split a node whose fan-out exceeds MAX_CHILDREN into siblings. */
function splitIfOverflow(node: RopeNode): RopeNode[] {
  if (node.kind === 'leaf') {
    if (node.pieces.length <= MAX_CHILDREN) return [node];
    const parts: RopeNode[] = [];
    for (let i = 0; i < node.pieces.length; i += SPLIT_SIZE) {
      parts.push(createLeaf(node.pieces.slice(i, i + SPLIT_SIZE)));
    }
    return parts;
  }
  if (node.children.length <= MAX_CHILDREN) return [node];
  const parts: RopeNode[] = [];
  for (let i = 0; i < node.children.length; i += SPLIT_SIZE) {
    parts.push(createInternal(node.children.slice(i, i + SPLIT_SIZE)));
  }
  return parts;
}

function buildFromNodes(nodes: RopeNode[]): RopeNode {
  if (nodes.length === 0) return createLeaf([]);
  if (nodes.length === 1) return nodes[0];
  if (nodes.length <= MAX_CHILDREN) return createInternal(nodes);
  const parents: RopeNode[] = [];
  for (let i = 0; i < nodes.length; i += MAX_CHILDREN) {
    const chunk = nodes.slice(i, i + MAX_CHILDREN);
    parents.push(chunk.length === 1 ? chunk[0] : createInternal(chunk));
  }
  return buildFromNodes(parents);
}

function buildTree(pieces: PieceDescriptor[]): RopeNode {
  if (pieces.length <= MAX_CHILDREN) return createLeaf(pieces);
  const leaves: RopeNode[] = [];
  for (let i = 0; i < pieces.length; i += MAX_CHILDREN) {
    leaves.push(createLeaf(pieces.slice(i, i + MAX_CHILDREN)));
  }
  return buildFromNodes(leaves);
}

/**
 * Rope B-tree wrapping a PieceTable for O(log n) operations.
 *
 * Offsets here are trusted; range validation belongs to TextStorage.
 */
export class Rope {
  private root: RopeNode;
  readonly pieceTable: PieceTable;

  constructor(pieceTable: PieceTable) {
    this.pieceTable = pieceTable;
    this.root = buildTree(pieceTable.originalPieces());
  }

  get totalChars(): number {
    return this.root.charCount;
  }

  get totalLineBreaks(): number {
    return this.root.lineBreakCount;
  }

  get totalBytes(): number {
    return this.root.byteCount;
  }

  // ─── Lookups ────────────────────────────────────────────────

  /**
   * Character offset of the start of a given line (0-based).
   * Line 0 starts at offset 0. Line N starts after the Nth newline.
   */
  findLineStart(lineNumber: number): number {
    if (lineNumber <= 0) return 0;
    if (lineNumber > this.root.lineBreakCount) return this.root.charCount;

    let targetBreak = lineNumber;
    let charOffset = 0;
    let node = this.root;

    while (node.kind === 'internal') {
      let next: RopeNode = node.children[node.children.length - 1];
      for (const child of node.children) {
        if (child.lineBreakCount >= targetBreak) {
          next = child;
          break;
        }
        targetBreak -= child.lineBreakCount;
        charOffset += child.charCount;
      }
      node = next;
    }

    for (const piece of node.pieces) {
      if (piece.lineBreakCount < targetBreak) {
        targetBreak -= piece.lineBreakCount;
        charOffset += piece.length;
        continue;
      }
      const buffer = this.pieceTable.bufferFor(piece);
      for (let i = 0; i < piece.length; i++) {
        if (buffer.charCodeAt(piece.start + i) === 10) {
          targetBreak--;
          if (targetBreak === 0) return charOffset + i + 1;
        }
      }
    }
    return charOffset;
  }

  /**
   * Which line (0-based) contains a given character offset.
   */
  findOffsetLine(offset: number): number {
    if (offset <= 0) return 0;
    if (offset >= this.root.charCount) return this.root.lineBreakCount;

    let lineCount = 0;
    let remaining = offset;
    let node = this.root;

    while (node.kind === 'internal') {
      let next: RopeNode = node.children[node.children.length - 1];
      for (const child of node.children) {
        if (remaining < child.charCount) {
          next = child;
          break;
        }
        remaining -= child.charCount;
        lineCount += child.lineBreakCount;
      }
      node = next;
    }

    for (const piece of node.pieces) {
      if (remaining >= piece.length) {
        remaining -= piece.length;
        lineCount += piece.lineBreakCount;
        continue;
      }
      const buffer = this.pieceTable.bufferFor(piece);
      for (let i = 0; i < remaining; i++) {
        if (buffer.charCodeAt(piece.start + i) === 10) lineCount++;
      }
      break;
    }
    return lineCount;
  }

  /** UTF-8 byte offset of a character offset. */
  charToByte(offset: number): number {
    if (offset <= 0) return 0;
    if (offset >= this.root.charCount) return this.root.byteCount;

    let bytes = 0;
    let remaining = offset;
    let node = this.root;

    while (node.kind === 'internal') {
      let next: RopeNode = node.children[node.children.length - 1];
      for (const child of node.children) {
        if (remaining < child.charCount) {
          next = child;
          break;
        }
        remaining -= child.charCount;
        bytes += child.byteCount;
      }
      node = next;
    }

    for (const piece of node.pieces) {
      if (remaining >= piece.length) {
        remaining -= piece.length;
        bytes += piece.byteLength;
        continue;
      }
      const buffer = this.pieceTable.bufferFor(piece);
      for (let i = 0; i < remaining; i++) {
        bytes += utf8Width(buffer.charCodeAt(piece.start + i));
      }
      break;
    }
    return bytes;
  }

  /**
   * Character offset of a UTF-8 byte offset. A byte offset that falls inside
   * a multi-byte sequence resolves to the character containing it.
   */
  byteToChar(byteOffset: number): number {
    if (byteOffset <= 0) return 0;
    if (byteOffset >= this.root.byteCount) return this.root.charCount;

    let chars = 0;
    let remaining = byteOffset;
    let node = this.root;

    while (node.kind === 'internal') {
      let next: RopeNode = node.children[node.children.length - 1];
      for (const child of node.children) {
        if (remaining < child.byteCount) {
          next = child;
          break;
        }
        remaining -= child.byteCount;
        chars += child.charCount;
      }
      node = next;
    }

    for (const piece of node.pieces) {
      if (remaining >= piece.byteLength) {
        remaining -= piece.byteLength;
        chars += piece.length;
        continue;
      }
      const buffer = this.pieceTable.bufferFor(piece);
      for (let i = 0; i < piece.length; i++) {
        const width = utf8Width(buffer.charCodeAt(piece.start + i));
        if (remaining < width) return chars + i;
        remaining -= width;
      }
      break;
    }
    return chars;
  }

  /** The character code at an offset, or -1 past the end. */
  charCodeAt(offset: number): number {
    if (offset < 0 || offset >= this.root.charCount) return -1;
    let remaining = offset;
    let node = this.root;
    while (node.kind === 'internal') {
      let next: RopeNode = node.children[node.children.length - 1];
      for (const child of node.children) {
        if (remaining < child.charCount) {
          next = child;
          break;
        }
        remaining -= child.charCount;
      }
      node = next;
    }
    for (const piece of node.pieces) {
      if (remaining < piece.length) {
        return this.pieceTable.bufferFor(piece).charCodeAt(piece.start + remaining);
      }
      remaining -= piece.length;
    }
    return -1;
  }

  // ─── Mutation ───────────────────────────────────────────────

  /**
   * Insert text at the given character offset.
   */
  insert(offset: number, text: string): void {
    if (text.length === 0) return;
    const pieces = this.pieceTable.append(text);
    const parts = this.insertInto(this.root, offset, pieces);
    this.root = buildFromNodes(parts);
  }

  private insertInto(node: RopeNode, offset: number, newPieces: PieceDescriptor[]): RopeNode[] {
    if (node.kind === 'leaf') {
      this.spliceIntoLeaf(node, offset, newPieces);
      updateNodeStats(node);
      return splitIfOverflow(node);
    }

    let index = 0;
    let remaining = offset;
    for (; index < node.children.length - 1; index++) {
      const child = node.children[index];
      if (remaining <= child.charCount) break;
      remaining -= child.charCount;
    }
    const replaced = this.insertInto(node.children[index], remaining, newPieces);
    node.children.splice(index, 1, ...replaced);
    updateNodeStats(node);
    return splitIfOverflow(node);
  }

  private spliceIntoLeaf(leaf: LeafNode, offset: number, newPieces: PieceDescriptor[]): void {
    let index = 0;
    let remaining = offset;
    while (index < leaf.pieces.length && remaining > 0 && remaining >= leaf.pieces[index].length) {
      remaining -= leaf.pieces[index].length;
      index++;
    }

    if (remaining === 0 || index >= leaf.pieces.length) {
      this.mergeOrSplice(leaf, index, newPieces);
      return;
    }

    const target = leaf.pieces[index];
    const left = this.pieceTable.slicePiece(target, 0, remaining);
    const right = this.pieceTable.slicePiece(target, remaining, target.length);
    leaf.pieces.splice(index, 1, left, ...newPieces, right);
  }

  /**
   * Splice pieces at an index, extending the previous piece in place when a
   * single new piece continues it in the add buffer (consecutive typing).
   */
  private mergeOrSplice(leaf: LeafNode, index: number, newPieces: PieceDescriptor[]): void {
    const prev = index > 0 ? leaf.pieces[index - 1] : undefined;
    const only = newPieces.length === 1 ? newPieces[0] : undefined;
    if (
      prev !== undefined &&
      only !== undefined &&
      prev.bufferType === 'add' &&
      only.bufferType === 'add' &&
      prev.start + prev.length === only.start &&
      prev.length + only.length <= MAX_PIECE_LENGTH
    ) {
      leaf.pieces[index - 1] = {
        bufferType: 'add',
        start: prev.start,
        length: prev.length + only.length,
        lineBreakCount: prev.lineBreakCount + only.lineBreakCount,
        byteLength: prev.byteLength + only.byteLength,
      };
      return;
    }
    leaf.pieces.splice(index, 0, ...newPieces);
  }

  /**
   * Delete the character range [start, end).
   */
  delete(start: number, end: number): void {
    if (start >= end) return;
    const parts = this.deleteFrom(this.root, start, end);
    let root = buildFromNodes(parts);
    while (root.kind === 'internal' && root.children.length === 1) {
      root = root.children[0];
    }
    this.root = root;
  }

  private deleteFrom(node: RopeNode, start: number, end: number): RopeNode[] {
    if (node.kind === 'leaf') {
      const kept: PieceDescriptor[] = [];
      let pos = 0;
      for (const piece of node.pieces) {
        const pieceStart = pos;
        const pieceEnd = pos + piece.length;
        pos = pieceEnd;
        if (pieceEnd <= start || pieceStart >= end) {
          kept.push(piece);
          continue;
        }
        if (pieceStart < start) {
          kept.push(this.pieceTable.slicePiece(piece, 0, start - pieceStart));
        }
        if (pieceEnd > end) {
          kept.push(this.pieceTable.slicePiece(piece, end - pieceStart, piece.length));
        }
      }
      node.pieces = kept;
      updateNodeStats(node);
      if (kept.length === 0) return [];
      return splitIfOverflow(node);
    }

    const kept: RopeNode[] = [];
    let pos = 0;
    for (const child of node.children) {
      const childStart = pos;
      const childEnd = pos + child.charCount;
      pos = childEnd;
      if (childEnd <= start || childStart >= end) {
        kept.push(child);
        continue;
      }
      const localStart = Math.max(start - childStart, 0);
      const localEnd = Math.min(end - childStart, child.charCount);
      kept.push(...this.deleteFrom(child, localStart, localEnd));
    }
    node.children = kept;
    updateNodeStats(node);
    if (kept.length === 0) return [];
    return splitIfOverflow(node);
  }

  // ─── Reading ────────────────────────────────────────────────

  /**
   * Get text in a character range [start, end).
   */
  getText(start: number, end: number): string {
    if (start >= end) return '';
    const parts: string[] = [];
    this.collectText(this.root, start, end, parts);
    return parts.join('');
  }

  private collectText(node: RopeNode, start: number, end: number, parts: string[]): void {
    let pos = 0;
    if (node.kind === 'leaf') {
      for (const piece of node.pieces) {
        const pieceStart = pos;
        pos += piece.length;
        if (pos <= start) continue;
        if (pieceStart >= end) return;
        const readStart = Math.max(start - pieceStart, 0);
        const readEnd = Math.min(end - pieceStart, piece.length);
        parts.push(
          this.pieceTable.bufferFor(piece).substring(piece.start + readStart, piece.start + readEnd),
        );
      }
      return;
    }
    for (const child of node.children) {
      const childStart = pos;
      pos += child.charCount;
      if (pos <= start) continue;
      if (childStart >= end) return;
      this.collectText(child, start - childStart, end - childStart, parts);
    }
  }

  getFullText(): string {
    return this.getText(0, this.root.charCount);
  }

  /** Depth of the tree; a lone leaf has depth 1. */
  depth(): number {
    let depth = 1;
    let node = this.root;
    while (node.kind === 'internal') {
      node = node.children[0];
      depth++;
    }
    return depth;
  }
}
