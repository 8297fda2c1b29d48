import { ApiProperty } from '@nestjs/swagger';
import { IsBoolean, IsEnum, IsNotEmpty, IsNumber, IsOptional, IsPositive, IsString, Matches, Max, Min } from 'class-validator';
import { HeadlinePosition, LogoBackground, TextAlignment } from '../../../libs/enums/CreativeEnums';
import { ValidationMessage } from '../../../libs/messages';

/**
 * Generate Ad DTO
 *
 * Request body for POST /generate-ad.
 * Everything except the background and headline has a default,
 * applied in `toAdSpec`.
 */
export class GenerateAdDto {
    @ApiProperty({ description: 'Background photo URL', example: 'https://images.example.com/beach.jpg' })
    @IsString({ message: ValidationMessage.FIELD_INVALID })
    @IsNotEmpty({ message: ValidationMessage.FIELD_REQUIRED })
    @Matches(/\S/, { message: ValidationMessage.FIELD_REQUIRED })
    background_image_url!: string;

    @ApiProperty({ description: 'Main headline (any script)', example: 'Summer Sale' })
    @IsString({ message: ValidationMessage.FIELD_INVALID })
    @IsNotEmpty({ message: ValidationMessage.FIELD_REQUIRED })
    @Matches(/\S/, { message: ValidationMessage.FIELD_REQUIRED })
    headline!: string;

    @ApiProperty({ required: false, example: 'Up to 50% off everything' })
    @IsOptional()
    @IsString()
    subheadline?: string | null;

    /** Empty string or null disables the button */
    @ApiProperty({ required: false, default: 'Shop Now' })
    @IsOptional()
    @IsString()
    cta_text?: string | null;

    @ApiProperty({ required: false, example: 'https://images.example.com/logo.png' })
    @IsOptional()
    @IsString()
    logo_url?: string | null;

    @ApiProperty({ required: false, default: 'instagram_feed', description: 'Format name or alias' })
    @IsOptional()
    @IsString()
    format?: string;

    @ApiProperty({ required: false, default: '#000000', description: 'CTA label colour' })
    @IsOptional()
    @IsString()
    primary_color?: string;

    @ApiProperty({ required: false, default: '#FFFFFF', description: 'Brand secondary colour (not drawn)' })
    @IsOptional()
    @IsString()
    secondary_color?: string;

    @ApiProperty({ required: false, default: '#FFD700', description: 'CTA button colour' })
    @IsOptional()
    @IsString()
    accent_color?: string;

    @ApiProperty({ required: false, default: '#FFFFFF', description: 'Headline and subheadline colour' })
    @IsOptional()
    @IsString()
    text_color?: string;

    @ApiProperty({ required: false, enum: HeadlinePosition, default: HeadlinePosition.BOTTOM })
    @IsOptional()
    @IsEnum(HeadlinePosition, { message: ValidationMessage.HEADLINE_POSITION_INVALID })
    headline_position?: HeadlinePosition;

    @ApiProperty({ required: false, enum: TextAlignment, default: TextAlignment.AUTO })
    @IsOptional()
    @IsEnum(TextAlignment, { message: ValidationMessage.TEXT_ALIGNMENT_INVALID })
    text_alignment?: TextAlignment;

    @ApiProperty({ required: false, default: 'top_left', example: 'bottom_right' })
    @IsOptional()
    @IsString()
    logo_position?: string;

    @ApiProperty({ required: false, enum: LogoBackground, default: LogoBackground.NONE })
    @IsOptional()
    @IsEnum(LogoBackground, { message: ValidationMessage.LOGO_BACKGROUND_INVALID })
    logo_background?: LogoBackground;

    @ApiProperty({ required: false, default: 1.0 })
    @IsOptional()
    @IsNumber({}, { message: ValidationMessage.LOGO_SCALE_INVALID })
    @IsPositive({ message: ValidationMessage.LOGO_SCALE_INVALID })
    logo_scale?: number;

    @ApiProperty({ required: false, default: true })
    @IsOptional()
    @IsBoolean()
    add_overlay?: boolean;

    @ApiProperty({ required: false, default: 0.3 })
    @IsOptional()
    @IsNumber({}, { message: ValidationMessage.OVERLAY_OPACITY_INVALID })
    @Min(0, { message: ValidationMessage.OVERLAY_OPACITY_INVALID })
    @Max(1, { message: ValidationMessage.OVERLAY_OPACITY_INVALID })
    overlay_opacity?: number;

    @ApiProperty({ required: false, description: 'TTF/OTF URL for the headline' })
    @IsOptional()
    @IsString()
    headline_font_url?: string | null;

    @ApiProperty({ required: false, description: 'TTF/OTF URL for subheadline and CTA' })
    @IsOptional()
    @IsString()
    body_font_url?: string | null;

    @ApiProperty({ required: false, default: true })
    @IsOptional()
    @IsBoolean()
    uppercase_headline?: boolean;

    @ApiProperty({ required: false, default: true })
    @IsOptional()
    @IsBoolean()
    uppercase_cta?: boolean;
}
