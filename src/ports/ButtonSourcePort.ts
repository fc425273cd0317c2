import type { ButtonEdge } from '@/domain/ui/types';

export type ButtonEdgeListener = (edge: ButtonEdge) => void;

export interface ButtonSourcePort {
  readonly name: string;
  start(listener: ButtonEdgeListener): void;
  stop(): Promise<void>;
}
