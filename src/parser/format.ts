import { FilterNode, ISortNode, QueryNode, QueryValue } from './types';

function formatValue(value: QueryValue): string {
  return JSON.stringify(value);
}

/**
 * Render a node in its canonical textual form. Parsing the result against
 * the same model gives back an equal tree.
 */
export function formatQueryNode(node: QueryNode<unknown>): string {
  switch (node.type) {
    case 'comparison':
      return `${node.operator}(${node.column.name},${formatValue(node.value)})`;
    case 'compound':
      return `${node.operator}(${node.children.map(child => formatQueryNode(child)).join(',')})`;
    case 'sort':
      return `${node.direction}(${node.column.name})`;
  }
}

export function formatFilter(node: FilterNode<unknown>): string {
  return formatQueryNode(node);
}

export function formatSort(nodes: ReadonlyArray<ISortNode<unknown>>): string[] {
  return nodes.map(node => formatQueryNode(node));
}
