// This file centralizes client-side domain models shared by configuration, transport, and the call API.

export interface CredentialsInput {
  url: string;
  username: string;
  password: string;
}

// Built by createCredentials, which rejects a malformed endpoint before anything reaches the network.
export type Credentials = Readonly<CredentialsInput>;

export interface BasicAuthority {
  realm: string;
  username: string;
  password: string;
  site: URL;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export type Address = string;

// Amounts travel as JSON numbers with satoshi precision.
export type BtcAmount = number;

export type AddressAmountPair = readonly [Address, BtcAmount];
