import { RosterChanged } from './RosterChanged.js';

export class ParticipantUnregistered extends RosterChanged {
    readonly eventName = 'ParticipantUnregistered';
}
