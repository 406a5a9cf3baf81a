// Event types produced by the parser and consumed by the composer

import type { Position } from './position';

export type ScalarStyle = 'plain' | 'single' | 'double' | 'literal' | 'folded';

export type Event =
  | StreamStartEvent
  | StreamEndEvent
  | DocumentStartEvent
  | DocumentEndEvent
  | AliasEvent
  | ScalarEvent
  | SequenceStartEvent
  | SequenceEndEvent
  | MappingStartEvent
  | MappingEndEvent;

export type EventType = Event['type'];

/** Events that open a node and may carry an anchor and tag. */
export type NodeEvent = ScalarEvent | SequenceStartEvent | MappingStartEvent;

interface EventBase {
  start: Position;
  end: Position;
}

export interface StreamStartEvent extends EventBase {
  type: 'stream_start';
}

export interface StreamEndEvent extends EventBase {
  type: 'stream_end';
}

export interface DocumentStartEvent extends EventBase {
  type: 'document_start';
  /** Whether the document opened with an explicit `---`. */
  explicit: boolean;
  /** The `%YAML` version in effect, e.g. `'1.2'`, or null when none was declared. */
  version: string | null;
  /** `%TAG` handles declared for this document, handle → prefix. */
  tags: Record<string, string>;
}

export interface DocumentEndEvent extends EventBase {
  type: 'document_end';
  /** Whether the document closed with an explicit `...`. */
  explicit: boolean;
}

export interface AliasEvent extends EventBase {
  type: 'alias';
  anchor: string;
}

export interface ScalarEvent extends EventBase {
  type: 'scalar';
  anchor: string | null;
  /** Tag exactly as written (`!!int`, `!e!point`, `!<tag:x>`, `!`), or null. */
  tag: string | null;
  value: string;
  style: ScalarStyle;
  /** True for untagged plain scalars, which are typed by the schema. */
  implicit: boolean;
}

export interface SequenceStartEvent extends EventBase {
  type: 'sequence_start';
  anchor: string | null;
  tag: string | null;
  flow: boolean;
}

export interface SequenceEndEvent extends EventBase {
  type: 'sequence_end';
}

export interface MappingStartEvent extends EventBase {
  type: 'mapping_start';
  anchor: string | null;
  tag: string | null;
  flow: boolean;
}

export interface MappingEndEvent extends EventBase {
  type: 'mapping_end';
}
