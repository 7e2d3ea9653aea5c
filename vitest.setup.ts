import { configureLogger } from '@agent-studio/core';

configureLogger({ level: 'silent' });
