import { CRMAdapter, CRMConfig } from '../../types/crm';
import { AgencyZoomAdapter } from './agencyzoom.adapter';

export class CRMFactory {
  static create(crmType: string, config: CRMConfig): CRMAdapter {
    switch (crmType) {
      case 'agencyzoom':
        return new AgencyZoomAdapter(config);
      default:
        throw new Error(`Unsupported CRM type: ${crmType}`);
    }
  }
}
