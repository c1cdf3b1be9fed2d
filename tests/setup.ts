import { LogLevel, setLogLevel } from '../src/system/logging/logger';

setLogLevel(LogLevel.FATAL);
