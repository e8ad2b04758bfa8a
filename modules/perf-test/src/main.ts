#!/usr/bin/env node
import { main } from './perf-test-cli.js'

void main()
