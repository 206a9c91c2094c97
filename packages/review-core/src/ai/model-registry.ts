/**
 * Completion Model Registry
 *
 * Maps the short model keys accepted on the command line to the identifiers
 * the completion API expects.
 *
 * Design:
 * - `MODEL_DEFINITIONS` is the authoritative list of supported keys.
 * - The first entry is the default; unknown keys fall back to it.
 */

// ============================================================================
// Model Definition Interface
// ============================================================================

/**
 * Complete definition of a selectable model.
 */
export interface ModelDefinition {
    /** Short key used on the command line (e.g., 'davinci003') */
    readonly key: string;
    /** Model identifier sent to the API (e.g., 'text-davinci-003') */
    readonly id: string;
    /** Human-readable display label */
    readonly label: string;
    /** Performance/cost tier */
    readonly tier: 'fast' | 'standard';
}

// ============================================================================
// Model Registry (Source of Truth)
// ============================================================================

/**
 * Order matters: the first entry is the default model.
 */
const MODEL_DEFINITIONS = [
    {
        key: 'turbo',
        id: 'gpt-3.5-turbo',
        label: 'GPT-3.5 Turbo',
        tier: 'fast',
    },
    {
        key: 'davinci003',
        id: 'text-davinci-003',
        label: 'Davinci 003',
        tier: 'standard',
    },
] as const satisfies readonly ModelDefinition[];

/**
 * The model registry indexed by key for fast lookups.
 */
export const MODEL_REGISTRY: ReadonlyMap<string, ModelDefinition> = new Map(
    MODEL_DEFINITIONS.map(m => [m.key, m])
);

// ============================================================================
// Derived Constants
// ============================================================================

/**
 * Union type of all known model keys.
 */
export type ModelKey = typeof MODEL_DEFINITIONS[number]['key'];

/**
 * Model identifier used when a key is absent or unknown.
 */
export const DEFAULT_MODEL_ID: string = MODEL_DEFINITIONS[0].id;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Resolve a model key to the identifier sent to the API.
 * Unknown, empty or missing keys resolve to {@link DEFAULT_MODEL_ID}.
 */
export function selectModel(key?: string): string {
    if (!key) {
        return DEFAULT_MODEL_ID;
    }
    return MODEL_REGISTRY.get(key)?.id ?? DEFAULT_MODEL_ID;
}

/**
 * Get the full model definition for a key.
 * @returns The definition, or undefined if not found
 */
export function getModelDefinition(key: string): ModelDefinition | undefined {
    return MODEL_REGISTRY.get(key);
}

/**
 * Get all model definitions (ordered).
 */
export function getAllModels(): readonly ModelDefinition[] {
    return MODEL_DEFINITIONS;
}

/**
 * Check if a string is a known model key.
 */
export function isKnownModelKey(key: string): key is ModelKey {
    return MODEL_REGISTRY.has(key);
}
