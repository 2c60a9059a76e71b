/** Optional broker credentials, forwarded to the transport as-is. */
export interface Credentials {
  readonly username: string;
  readonly password?: string | undefined;
}

/** File paths for TLS material, forwarded to the transport as-is. */
export interface TlsSettings {
  readonly ca_certs?: string | undefined;
  readonly client_cert?: string | undefined;
  readonly client_key?: string | undefined;
  readonly reject_unauthorized?: boolean | undefined;
}

export type QoS = 0 | 1 | 2;

/**
 * Validated, immutable source definition. Supplied once at startup.
 */
export interface ConnectionConfig {
  readonly host: string;
  readonly port: number;
  readonly topic: string;
  readonly qos: QoS;
  readonly client_id?: string | undefined;
  readonly credentials?: Credentials | undefined;
  readonly tls?: TlsSettings | undefined;
}
