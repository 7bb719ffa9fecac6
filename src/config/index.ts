import { config } from 'dotenv';
import type { PlaysConfig, CredentialSource } from '../types/plays';
import { loadCredentials, loadPlaysConfig } from './schema';

// Load environment variables
config();

export const playsConfig: PlaysConfig = loadPlaysConfig(process.env);

// Read on every call so each resolver sees the current environment
export const envCredentials: CredentialSource = () => loadCredentials(process.env);
