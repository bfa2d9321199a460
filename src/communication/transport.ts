import { Observable } from 'rxjs';
import { Endpoint, RegisterAddress } from './types';

/** One S7comm session to a PLC. The client owns exactly one of these. */
export interface S7Transport {
    connect(endpoint: Endpoint): Observable<void>;
    readBytes(address: RegisterAddress): Observable<Buffer>;
    disconnect(): Observable<void>;
}
