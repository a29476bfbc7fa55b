import { RawQuantity } from './types';

// Asset timeline events produced by history replay
export type AssetEventType =
  | 'created'
  | 'issued_more'
  | 'changed_description'
  | 'locked'
  | 'transferred'
  | 'called_back';

export interface BaseAssetEvent {
  type: AssetEventType;
  at_block: number;
  at_block_time: number; // epoch ms
}

export interface CreatedEvent extends BaseAssetEvent {
  type: 'created';
  owner: string;
  description: string;
  divisible: boolean;
  locked: boolean;
  total_issued: RawQuantity;
  total_issued_normalized: number;
}

export interface IssuedMoreEvent extends BaseAssetEvent {
  type: 'issued_more';
  additional: RawQuantity;
  additional_normalized: number;
  total_issued: RawQuantity;
  total_issued_normalized: number;
}

export interface ChangedDescriptionEvent extends BaseAssetEvent {
  type: 'changed_description';
  prev_description: string;
  new_description: string;
}

export interface LockedEvent extends BaseAssetEvent {
  type: 'locked';
}

export interface TransferredEvent extends BaseAssetEvent {
  type: 'transferred';
  prev_owner: string;
  new_owner: string;
}

export interface CalledBackEvent extends BaseAssetEvent {
  type: 'called_back';
  percentage: number; // 0..100
}

export type AnyAssetEvent =
  | CreatedEvent
  | IssuedMoreEvent
  | ChangedDescriptionEvent
  | LockedEvent
  | TransferredEvent
  | CalledBackEvent;
