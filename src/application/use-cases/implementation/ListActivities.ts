import { IActivityRepository } from '../../ports/IActivityRepository.js';
import { ActivityCatalog } from '../../../domain/entities/Activity.js';

export class ListActivities {
    constructor(private activityRepository: IActivityRepository) { }

    async execute(): Promise<ActivityCatalog> {
        return this.activityRepository.findAll();
    }
}
