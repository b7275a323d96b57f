import 'reflect-metadata';
import { Logger } from '@nestjs/common';

// Nest loggers stay silent under Jest
Logger.overrideLogger(false);
