import { TextDirection } from '../../enums/CreativeEnums';

/** Body returned by POST /generate-ad */
export interface GenerateAdResponse {
    success: true;
    image_base64: string;
    /** Canonical preset name, even when an alias was requested */
    format: string;
    dimensions: string;
    text_direction: TextDirection;
}
