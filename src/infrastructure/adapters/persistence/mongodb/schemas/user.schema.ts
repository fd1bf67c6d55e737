import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

@Schema({ _id: false })
export class ProficiencyDocument {
  @Prop({ required: true })
  language!: string;

  @Prop({ required: true, enum: ['A1', 'A2', 'B1', 'B2', 'C1', 'C2'] })
  level!: string;
}

export const ProficiencySchema = SchemaFactory.createForClass(ProficiencyDocument);

/**
 * Mongoose document for the User entity.
 * Timestamps come from the domain, so Mongoose does not manage them.
 */
@Schema({
  collection: 'users',
  _id: false, // Disable auto ObjectId, we use custom string _id
})
export class UserDocument {
  @Prop({ type: String, required: true })
  _id!: string;

  @Prop({ required: true })
  nativeLanguage!: string;

  @Prop({ required: true })
  targetLanguage!: string;

  @Prop({ type: [ProficiencySchema], default: [] })
  proficiencies!: ProficiencyDocument[];

  // Optimistic concurrency counter, bumped on every save
  @Prop({ required: true, default: 1 })
  version!: number;

  @Prop({ required: true })
  createdAt!: Date;

  @Prop({ required: true })
  updatedAt!: Date;
}

export type UserDocumentType = HydratedDocument<UserDocument>;
export const UserSchema = SchemaFactory.createForClass(UserDocument);
