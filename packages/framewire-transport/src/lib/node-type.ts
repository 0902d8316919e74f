/**
 * Role of the node that owns a connection. Socket parameters depend on it.
 */
export type NodeType =
  | 'Requester'
  | 'Responder'
  | 'Publisher'
  | 'Subscriber'
  | 'ServiceQueue'
  | 'ServiceQueueReader'
  | 'ServiceQueueWriter';

const nodeTypesWithReceiveTimeout: ReadonlySet<NodeType> = new Set<NodeType>([
  'Requester',
  'ServiceQueueReader',
]);

/**
 * Only nodes that wait for a reply get a receive timeout; the others may sit idle indefinitely.
 */
export const nodeTypeHasReceiveTimeout = (nodeType: NodeType): boolean =>
  nodeTypesWithReceiveTimeout.has(nodeType);
