import { setLogMode } from '../src/logger.js';

setLogMode('off');
