/**
 * Embedded-systems feature table.
 *
 * Each feature is detected from source vocabulary. The context builder
 * turns detected features into prompt guidance, and the validator checks
 * that the generated test shows matching evidence.
 */

export interface EmbeddedFeature {
  id: string;
  label: string;
  /** Matched against the C source under test */
  detect: RegExp;
  /** Matched against the generated test; absence is an issue */
  evidence: RegExp;
  issue: string;
  /** Missing evidence also marks the test as not compiling */
  breaksCompilation: boolean;
  guidance: readonly string[];
}

export const EMBEDDED_FEATURES: readonly EmbeddedFeature[] = [
  {
    id: "volatile-registers",
    label: "Hardware registers",
    detect: /\bvolatile\b/,
    evidence: /\bvolatile\b/,
    issue: "Source uses volatile registers but tests don't handle volatile semantics",
    breaksCompilation: true,
    guidance: [
      "Declare fake registers with the same volatile qualifier as the source",
      "Test register reads and writes, including bit manipulation",
      "Check boundary and invalid register values",
    ],
  },
  {
    id: "bit-fields",
    label: "Bit fields",
    detect: /\b(?:unsigned|signed|int|uint\d+_t|int\d+_t|_Bool|bool)\s+(?:int\s+)?\w+\s*:\s*\d+\s*[;,]/,
    evidence: /<<|>>|~\s*\w|[&|^]=|\w\s*[&|^]\s*(?:0x|\w)/,
    issue: "Source uses bit fields but tests don't perform bit operations",
    breaksCompilation: false,
    guidance: [
      "Test each bit field individually and at its width limits",
      "Verify packing and unpacking with masks and shifts",
    ],
  },
  {
    id: "state-machine",
    label: "State machine",
    detect: /\b\w*state\w*\b|\bSTATE_\w+/i,
    evidence: /transition|state_change|next_state/i,
    issue: "Source has state machine but tests don't verify state transitions",
    breaksCompilation: false,
    guidance: [
      "Test every valid state transition and name tests after them",
      "Verify invalid transitions are rejected",
      "Check the initial state after initialization",
    ],
  },
  {
    id: "redundancy-voting",
    label: "Redundancy voting",
    detect: /\btmr\b|triple|voting|majority/i,
    evidence: /aaa|aab|abc|fault|disagree/i,
    issue: "Source has TMR voting but tests don't cover voting scenarios",
    breaksCompilation: false,
    guidance: [
      "Cover unanimous (AAA), single-fault (AAB) and full-disagreement (ABC) inputs",
      "Verify fault detection and fail-safe outputs",
    ],
  },
  {
    id: "watchdog",
    label: "Watchdog timer",
    detect: /watchdog|\bwdt\w*/i,
    evidence: /timeout|feed|kick/i,
    issue: "Source has watchdog timer but tests don't verify feeding/timeout",
    breaksCompilation: false,
    guidance: [
      "Test that feeding the watchdog prevents a reset",
      "Test the timeout path when feeding stops",
    ],
  },
  {
    id: "interrupts-dma",
    label: "Interrupts and DMA",
    detect: /\bdma\w*|interrupt|\birq\w*|\w*_isr\b|\bisr\b/i,
    evidence: /register|peripheral|mock|stub|simulat/i,
    issue: "Source uses DMA/interrupts but tests don't simulate hardware interactions",
    breaksCompilation: false,
    guidance: [
      "Simulate the peripheral through stubs or fake registers",
      "Test ISR entry and exit conditions and interrupt masking",
      "Verify DMA completion and error handling",
    ],
  },
  {
    id: "memory-mapped-io",
    label: "Memory-mapped I/O",
    detect: /\bmmio\b|memory[\s_-]?mapped|register\w*\s*\(?\s*0x|volatile\s+uint32_t\s*\*/i,
    evidence: /[&|^]=|\bread|\bwrite|\breg\w*\s*=[^=]/i,
    issue: "Source uses memory-mapped I/O but tests don't verify register access",
    breaksCompilation: false,
    guidance: [
      "Point register addresses at test buffers instead of hardware",
      "Verify read-modify-write sequences with &=, |= and ^=",
    ],
  },
];

/**
 * Features whose vocabulary appears in the source
 */
export function detectEmbeddedFeatures(source: string): EmbeddedFeature[] {
  return EMBEDDED_FEATURES.filter((feature) => feature.detect.test(source));
}
