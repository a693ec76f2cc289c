#!/usr/bin/env node
import 'reflect-metadata';
import 'dotenv/config';
import { main } from './run-cli';

main('binance');
