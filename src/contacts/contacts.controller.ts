import { Body, Controller, Get, HttpCode, HttpStatus, Post, UseGuards } from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ContactsService } from './contacts.service';
import { CreateContactDto } from './dto/create-contact.dto';
import { ContactRecord } from './dto/contact-response.dto';
import { AdminTokenGuard, ADMIN_TOKEN_HEADER } from '../guards/admin-token.guard';

@ApiTags('📬 Contacts')
@Controller('api')
export class ContactsController {
	constructor(private readonly contactsService: ContactsService) {}

	@Post('contact')
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: 'Submit the contact form' })
	@ApiResponse({ status: 200, description: 'Enquiry recorded; operator notice and auto-reply queued' })
	@ApiResponse({ status: 400, description: 'Invalid input' })
	submit(@Body() dto: CreateContactDto): Promise<{ status: 'ok'; message: string }> {
		return this.contactsService.submit(dto);
	}

	@Get('contacts')
	@UseGuards(AdminTokenGuard)
	@ApiHeader({ name: ADMIN_TOKEN_HEADER, required: true })
	@ApiOperation({ summary: 'List enquiries, newest first' })
	@ApiResponse({ status: 200, description: 'All recorded enquiries' })
	@ApiResponse({ status: 401, description: 'Missing or invalid admin token' })
	findAll(): Promise<ContactRecord[]> {
		return this.contactsService.findAll();
	}
}
