import { createLogger, setDefaultLogger } from '@tickscope/shared';

setDefaultLogger(createLogger({ level: 'fatal', destination: 2 }));
