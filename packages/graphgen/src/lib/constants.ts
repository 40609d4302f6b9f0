export const UNIFORM_RANDOM_MODEL_NAME = 'uniform-random' as const;
export const PREFERENTIAL_ATTACHMENT_MODEL_NAME = 'preferential-attachment' as const;

export const GRAPH_MODELS = [
  UNIFORM_RANDOM_MODEL_NAME,
  PREFERENTIAL_ATTACHMENT_MODEL_NAME,
] as const;

// when attachment weights are refreshed during a growth step
export const RECOMPUTE_PER_NODE = 'per-node' as const;
export const RECOMPUTE_PER_EDGE = 'per-edge' as const;

export const RECOMPUTE_POLICIES = [RECOMPUTE_PER_NODE, RECOMPUTE_PER_EDGE] as const;

export const DEFAULT_EDGE_LIST_DELIMITER = '\t';
