import { Command } from '../types';
import * as join from './join';
import * as summon from './summon';
import * as play from './play';
import * as pause from './pause';
import * as resume from './resume';
import * as stop from './stop';
import * as skip from './skip';
import * as volume from './volume';
import * as playing from './playing';
import * as queue from './queue';

const all: Command[] = [join, summon, play, pause, resume, stop, skip, volume, playing, queue];

export const commands = new Map(all.map((command) => [command.name, command] as const));
