/**
 * Runtime JSON Schema for plan definition files, validated with ajv.
 *
 * Kept as a plain object so it can be fed directly to
 * `new Ajv().compile(PLAN_JSON_SCHEMA)`. {@link RawPlanFile} is the shape a
 * document has once it passes validation.
 */

import type { MountMode } from './plan.js';

// ---------------------------------------------------------------------------
// Raw document types
// ---------------------------------------------------------------------------

/** Host side of a port mapping: a port number or `auto`. */
export type RawHostPort = number | 'auto';

/** `{ "80": 8080, "53/udp": auto }` */
export type RawPortMap = Record<string, RawHostPort>;

/** A bare number publishes the same port on the host. */
export type RawPortEntry = number | RawPortMap;

export interface RawVolume {
  bind: string;
  mode?: MountMode;
}

export type RawOptionValue = string | number | boolean | string[];

/** A plan file as written, after schema validation. */
export interface RawPlanFile {
  name?: string;
  image: string;
  version?: string | number;
  command?: string | string[];
  detach?: boolean;
  tty?: boolean;
  dockerfile?: string;
  volumes?: Record<string, RawVolume>;
  ports?: RawPortEntry | RawPortEntry[];
  environment?: string[] | Record<string, string | number | boolean>;
  options?: Record<string, RawOptionValue>;
}

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

/** Container side of a port mapping: `80` or `80/udp`. */
export const PORT_KEY_PATTERN = '^[0-9]{1,5}(/(tcp|udp))?$';

export const PLAN_JSON_SCHEMA = {
  $id: 'dwn:plan',
  type: 'object' as const,
  required: ['image'],
  additionalProperties: false,

  $defs: {
    port: { type: 'integer', minimum: 1, maximum: 65535 },

    hostPort: {
      oneOf: [{ $ref: '#/$defs/port' }, { const: 'auto' }],
    },

    portMap: {
      type: 'object' as const,
      minProperties: 1,
      propertyNames: { pattern: PORT_KEY_PATTERN },
      additionalProperties: { $ref: '#/$defs/hostPort' },
    },

    portEntry: {
      oneOf: [{ $ref: '#/$defs/port' }, { $ref: '#/$defs/portMap' }],
    },

    volume: {
      type: 'object' as const,
      required: ['bind'],
      additionalProperties: false,
      properties: {
        bind: { type: 'string', minLength: 1 },
        mode: { type: 'string', enum: ['rw', 'ro'] },
      },
    },
  },

  properties: {
    name: { type: 'string', pattern: '^[a-zA-Z0-9][a-zA-Z0-9_.-]*$' },
    image: { type: 'string', minLength: 1 },
    version: { type: ['string', 'number'] },
    command: {
      oneOf: [{ type: 'string' }, { type: 'array', items: { type: 'string' } }],
    },
    detach: { type: 'boolean' },
    tty: { type: 'boolean' },
    dockerfile: { type: 'string', minLength: 1 },
    volumes: {
      type: 'object',
      additionalProperties: { $ref: '#/$defs/volume' },
    },
    ports: {
      oneOf: [
        { $ref: '#/$defs/portEntry' },
        { type: 'array', items: { $ref: '#/$defs/portEntry' } },
      ],
    },
    environment: {
      oneOf: [
        { type: 'array', items: { type: 'string', pattern: '^[^=]+=' } },
        {
          type: 'object',
          additionalProperties: { type: ['string', 'number', 'boolean'] },
        },
      ],
    },
    options: {
      type: 'object',
      additionalProperties: {
        oneOf: [
          { type: ['string', 'number', 'boolean'] },
          { type: 'array', items: { type: 'string' } },
        ],
      },
    },
  },
};
