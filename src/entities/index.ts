import { Dictionary } from './Dictionary';
import { DictionaryValue } from './DictionaryValue';
import { Document } from './Document';
import { Faq } from './Faq';
import { Interface } from './Interface';
import { Parameter } from './Parameter';
import { Project } from './Project';
import { User } from './User';

export { Dictionary, DictionaryValue, Document, Faq, Interface, Parameter, Project, User };

export const ENTITIES = [User, Project, Interface, Parameter, Dictionary, DictionaryValue, Document, Faq];
