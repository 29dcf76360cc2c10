import { Token } from 'typedi';
import type { DataSource } from 'typeorm';
import type { AppConfig } from '../config';

export const DATA_SOURCE = new Token<DataSource>('data-source');
export const APP_CONFIG = new Token<AppConfig>('app-config');
