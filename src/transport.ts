import { createSocket, type RemoteInfo } from 'node:dgram';
import type { Endpoint } from './types.js';

export type { RemoteInfo };

export interface DatagramSocket {
  bind(port: number, address: string, callback: () => void): unknown;
  send(msg: Uint8Array, port: number, address: string, callback: (error: Error | null) => void): void;
  on(event: 'message', listener: (msg: Buffer, rinfo: RemoteInfo) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  once(event: 'error', listener: (err: Error) => void): unknown;
  removeListener(event: 'error', listener: (err: Error) => void): unknown;
  close(callback?: () => void): void;
}

export type SocketFactory = (endpoint: Endpoint) => DatagramSocket;

export const udpSocketFactory: SocketFactory = () => createSocket('udp4');

export function bindSocket(socket: DatagramSocket, endpoint: Endpoint): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => reject(err);
    socket.once('error', onError);
    socket.bind(endpoint.port, endpoint.host, () => {
      socket.removeListener('error', onError);
      resolve();
    });
  });
}

export function closeSocket(socket: DatagramSocket): Promise<void> {
  return new Promise((resolve) => {
    try {
      socket.close(() => resolve());
    } catch (error) {
      // already closed
      if (error instanceof Error && 'code' in error && error.code === 'ERR_SOCKET_DGRAM_NOT_RUNNING') resolve();
      else throw error;
    }
  });
}
