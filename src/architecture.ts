/**
 * ARCHITECTURE INDEX (GROUPED)
 *
 * CONCEPT
 * 1. Registry Ownership
 *
 * POLICY
 * 2. Reject Before Mutate
 * 3. Sentinel Defaults
 *
 * STRATEGY
 * 4. Copy-on-Inherit
 *
 * LIFECYCLE
 * 5. Construction Pipeline
 *
 * Recommended reading flow:
 * CONCEPT -> STRATEGY -> LIFECYCLE -> POLICY (enforcement)
 */

/**
 * HEADER TAXONOMY
 *
 * - CONCEPT:
 *   Mental model framing the problem space.
 *
 * - POLICY:
 *   Non-negotiable rule (`must` / `must not`) and enforcement semantics.
 *
 * - STRATEGY:
 *   Chosen implementation approach used to satisfy policies.
 *
 * - LIFECYCLE:
 *   Step-by-step process flow across phases.
 */

/**
 * ARCHITECTURAL CONCEPT (1)
 * Registry Ownership
 *
 * ---
 *
 * Options are declared on a **class**, not on instances. Each class owns one
 * `Definitions` registry, stored in a `WeakMap` keyed by the constructor.
 *
 *   class User { ... }
 *   declareOption(User, 'name', { type: String, reader: true });
 *   // registries: User -> Definitions { name }
 *
 * Every instance of `User` is processed against that single registry.
 * The registry is written while the class is being declared and only read
 * once instances exist.
 */
export type RegistryOwnership = never;

/**
 * ARCHITECTURAL POLICY (2)
 * Reject Before Mutate
 *
 * ---
 *
 * Rule
 * ----
 * Unknown keys MUST be detected over the whole construction mapping before any
 * default is computed, any value validated or any reader bound.
 *
 * Enforcement
 * -----------
 * `Definitions.process` runs the unknown-key scan as a separate first pass.
 * A single undeclared key rejects the call with `InvalidOptionKeyError`,
 * whatever the validity of the other keys.
 *
 * Value errors
 * ------------
 * Value validation is not aggregated: the first option, in declaration order,
 * whose value fails its type or allowed set aborts construction with
 * `InvalidOptionValueError`.
 */
export type RejectBeforeMutatePolicy = never;

/**
 * ARCHITECTURAL POLICY (3)
 * Sentinel Defaults
 *
 * ---
 *
 * Rule
 * ----
 * "No default" MUST NOT be encoded as `undefined` or `null`.
 *
 * `false`, `null`, `undefined`, `0`, `''` and `[]` are all legitimate default
 * values. Absence is marked by the `Undefined` symbol, which no user value can
 * equal.
 *
 *   { default: undefined }   -> hasDefault() === true, resolves to undefined
 *   {}                       -> hasDefault() === false
 *
 * Computed defaults are a separate, branded variant (`computed(fn)`), so a
 * plain function remains usable as a static default.
 */
export type SentinelDefaultPolicy = never;

/**
 * ARCHITECTURAL STRATEGY (4)
 * Copy-on-Inherit
 *
 * ---
 *
 * A subclass receives a shallow copy of its parent's registry: a new `Map`
 * holding the same frozen `Option` references.
 *
 *   Base:  { name }
 *   Child: clone(Base) + { level }    -> { name, level }
 *   Base after Child declares:        -> { name }   (unchanged)
 *
 * Overrides are plain redeclarations: the last `define` of a name wins and
 * keeps the name's position in declaration order.
 *
 * Timing
 * ------
 * JavaScript exposes no "subclass created" hook. The copy is taken the first
 * time the subclass is used by the mechanism (declaration or construction),
 * recursively deriving intermediate classes. Declaring options at class
 * definition time therefore reproduces "copy once, at derivation".
 */
export type CopyOnInheritStrategy = never;

/**
 * ARCHITECTURAL LIFECYCLE (5)
 * Construction Pipeline
 *
 * ---
 *
 * 1. Copy:      the caller's mapping is copied (`null`/omitted -> `{}`).
 * 2. Scan:      unknown keys are rejected ({@link RejectBeforeMutatePolicy}).
 * 3. Per option, in declaration order:
 *    a. Default: a missing key receives the static or computed default.
 *    b. Check:   a present key is checked against type, then allowed set.
 *    c. Bind:    reader options bind the value into the owner's slot.
 * 4. Freeze:    the completed mapping is frozen and stored on the instance.
 *
 * Because steps a-c run option by option, a computed default can read the
 * readers of options declared before it.
 */
export type ConstructionPipeline = never;
