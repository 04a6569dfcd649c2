import { IActivityRepository } from '../../ports/IActivityRepository.js';
import { IEventDispatcher } from '../../ports/IEventDispatcher.js';
import { IRegistrationResult } from '../../../domain/entities/Activity.js';
import { ParticipantUnregistered } from '../../../domain/events/ParticipantUnregistered.js';
import { RegistrationRequest } from './SignUpForActivity.js';

export class UnregisterFromActivity {
    constructor(
        private activityRepository: IActivityRepository,
        private eventDispatcher: IEventDispatcher
    ) { }

    async execute(request: RegistrationRequest): Promise<IRegistrationResult> {
        const result = await this.activityRepository.removeParticipant(request.activityName, request.email);

        await this.eventDispatcher.dispatch(new ParticipantUnregistered(result.activityName, result.email));

        return result;
    }
}
