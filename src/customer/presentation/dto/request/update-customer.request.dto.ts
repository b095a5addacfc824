import { CreateCustomerRequestDto } from './create-customer.request.dto';

/** Full replacement of the editable fields; same rules as create. */
export class UpdateCustomerRequestDto extends CreateCustomerRequestDto {}
