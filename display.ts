import type { KDNode } from "./KdTree";
import type { PointRecord } from "./point";

export type NodeLabel<P> = (point: PointRecord<P>) => string;

function round3(value: number): string {
  return String(Math.round(value * 1000) / 1000);
}

export function formatCoordinate<P>(point: PointRecord<P>): string {
  return `${round3(point.x)},${round3(point.y)}`;
}

interface Block {
  lines: string[];
  width: number;
  middle: number; // column of the connector above this block
}

const pad = (n: number, ch = " ") => ch.repeat(n);

function layout<P>(node: KDNode<P>, label: NodeLabel<P>): Block {
  const s = label(node.point);
  const u = s.length;
  const { left, right } = node;

  if (left && right) {
    const a = layout(left, label);
    const b = layout(right, label);
    const { width: n, middle: x } = a;
    const { width: m, middle: y } = b;
    const body: string[] = [];
    for (let i = 0; i < Math.max(a.lines.length, b.lines.length); i++) {
      body.push((a.lines[i] ?? pad(n)) + pad(u) + (b.lines[i] ?? pad(m)));
    }
    return {
      lines: [
        pad(x + 1) + pad(n - x - 1, "_") + s + pad(y, "_") + pad(m - y),
        pad(x) + "|" + pad(n - x - 1 + u + y) + "|" + pad(m - y - 1),
        ...body,
      ],
      width: n + m + u,
      middle: n + Math.floor(u / 2),
    };
  }

  if (left) {
    const { lines, width: n, middle: x } = layout(left, label);
    return {
      lines: [
        pad(x + 1) + pad(n - x - 1, "_") + s,
        pad(x) + "|" + pad(n - x - 1 + u),
        ...lines.map((line) => line + pad(u)),
      ],
      width: n + u,
      middle: n + Math.floor(u / 2),
    };
  }

  if (right) {
    const { lines, width: n, middle: x } = layout(right, label);
    return {
      lines: [
        s + pad(x, "_") + pad(n - x),
        pad(u + x) + "|" + pad(n - x - 1),
        ...lines.map((line) => pad(u) + line),
      ],
      width: n + u,
      middle: Math.floor(u / 2),
    };
  }

  return { lines: [s], width: u, middle: Math.floor(u / 2) };
}

/** ASCII drawing of a tree, one string per row, widest at the leaves. */
export function renderTree<P>(root: KDNode<P> | null, label: NodeLabel<P> = formatCoordinate): string[] {
  return root ? layout(root, label).lines : [];
}
