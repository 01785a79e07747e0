#!/usr/bin/env -S node --import tsx
import { main } from './program';

process.exitCode = await main(process.argv);
