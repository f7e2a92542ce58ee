import type { RawSensorNode } from '@rigcheck/sensors';
import { escapeHtml, renderDocument } from './html';

export type TreeReportInput = {
  generatedAt: string;
  source: string;
  root: RawSensorNode;
};

const TREE_STYLES = `<style>
  ul.tree, ul.tree ul { list-style: none; margin: 0; padding-left: 18px; border-left: 1px dotted #3a3f48; }
  ul.tree li { margin: 2px 0; font-size: 13px; }
  .node-value { color: #8ab4f8; margin-left: 8px; }
  .node-range { color: #9aa3b2; margin-left: 8px; }
</style>`;

const renderNode = (node: RawSensorNode): string => {
  const parts = [`<span class="node-name">${escapeHtml(node.name)}</span>`];
  if (node.value) {
    parts.push(`<span class="node-value">${escapeHtml(node.value)}</span>`);
  }
  if (node.min || node.max) {
    parts.push(
      `<span class="node-range">min ${escapeHtml(node.min ?? '-')} / max ${escapeHtml(node.max ?? '-')}</span>`,
    );
  }
  if (node.children.length === 0) {
    return `<li>${parts.join('')}</li>`;
  }
  const children = node.children.map(renderNode).join('\n');
  return `<li>${parts.join('')}\n<ul>\n${children}\n</ul>\n</li>`;
};

export const countNodes = (node: RawSensorNode): number => {
  return node.children.reduce((sum, child) => sum + countNodes(child), 1);
};

export const renderTreeReport = (input: TreeReportInput): string => {
  const body = [
    TREE_STYLES,
    '<h1>Sensor tree</h1>',
    `<p class="meta">Generated ${escapeHtml(input.generatedAt)} from ${escapeHtml(input.source)} (${countNodes(input.root)} nodes)</p>`,
    '<ul class="tree">',
    renderNode(input.root),
    '</ul>',
  ].join('\n');
  return renderDocument('Sensor tree', body);
};
