/**
 * Net - transport contract, wire protocol, loopback and `ws` adapters
 */

export * from './transport';
export * from './protocol';
export * from './loopback';
export * from './relay-room';
export * from './relay-server';
export * from './ws-transport';
