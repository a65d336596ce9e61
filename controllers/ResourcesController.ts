import { Controller, GET } from 'fastify-decorators';
import { RESEARCH_RESOURCES } from '../services/resources.js';

@Controller('/api')
export default class ResourcesController {
  @GET('/resources')
  async list() {
    return {
      resources: RESEARCH_RESOURCES,
      count: RESEARCH_RESOURCES.length,
      last_updated: new Date().toISOString().slice(0, 10),
    };
  }
}
